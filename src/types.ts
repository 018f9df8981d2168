export type Product = Readonly<{
  id: string;
  name: string;
  retailer?: string;
  price: number;
  brand?: string;
  model?: string;
  category?: string;
  dimensions?: string;
  material?: string;
  color?: string;
  description?: string;
  imageRef?: string;
  url?: string;
}>;

export const TEXT_ATTRIBUTES = [
  "name",
  "brand",
  "model",
  "category",
  "dimensions",
  "material",
  "color",
  "description",
] as const;

export type TextAttribute = (typeof TEXT_ATTRIBUTES)[number];

export const SCORED_ATTRIBUTES = [...TEXT_ATTRIBUTES, "image", "specs", "price"] as const;

export type ScoredAttribute = (typeof SCORED_ATTRIBUTES)[number];

export type SpecUnit = "count" | "l" | "gal" | "kg" | "w" | "inch" | "cm";

export interface SpecValue {
  value: number;
  unit: SpecUnit;
}

export const SPEC_KEYS = [
  "tiers",
  "lines",
  "steps",
  "sockets",
  "volume",
  "weight",
  "wattage",
  "size_inch",
  "length",
] as const;

export type SpecKey = (typeof SPEC_KEYS)[number];

export type ProductSpecs = Partial<Record<SpecKey, SpecValue>>;

export interface NormalizedProduct {
  product: Product;
  canonical: Partial<Record<TextAttribute, string>>;
  specs: ProductSpecs;
  /** Dimension axes in centimetres, in the order they were written. */
  dimensionAxes: number[] | null;
}

export type AttributeScoreValue =
  | { kind: "present"; value: number }
  | { kind: "absent" };

export type AttributeScores = Partial<Record<ScoredAttribute, AttributeScoreValue>>;

export type WeightTable = Partial<Record<ScoredAttribute, number>>;

export type MatchMode = "weighted" | "house_brand";

export type MatchMethod = "weighted" | "house_brand" | "ai_reranked";

export interface CandidateShortlistEntry {
  target: NormalizedProduct;
  targetIndex: number;
  prefilterScore: number;
}

export interface MatchCandidate {
  sourceId: string;
  targetId: string;
  targetIndex: number;
  prefilterScore: number;
  scores: AttributeScores;
  aggregateScore: number | null;
  conflictReasons: string[];
}

export type ReRankVerdict =
  | { kind: "ranked"; targetId: string; confidence: number; reason: string }
  | { kind: "no_match"; reason: string };

export interface ReRankRequest {
  source: NormalizedProduct;
  candidates: Array<{ target: NormalizedProduct; aggregateScore: number }>;
  /** Aborted once the engine stops waiting for the verdict. */
  signal?: AbortSignal;
}

export interface ReRankProvider {
  rerank(input: ReRankRequest): Promise<ReRankVerdict>;
}

export interface ImageCompareRequest {
  sourceRef: string;
  targetRef: string;
  signal?: AbortSignal;
}

export interface VisualSimilarityProvider {
  compareImages(input: ImageCompareRequest): Promise<number>;
}

export type ReRankOutcome =
  | { kind: "picked"; targetId: string; confidence: number; reason: string }
  | { kind: "rejected"; reason: string }
  | { kind: "skipped" };

export interface SourceDecision {
  source: NormalizedProduct;
  mode: MatchMode;
  /** Sorted by aggregate score descending, then target catalog order. */
  candidates: MatchCandidate[];
  rerank: ReRankOutcome;
  degraded: boolean;
}

export interface MatchResult {
  sourceId: string;
  targetId: string;
  aggregateScore: number;
  method: MatchMethod;
  priceDeltaAbsolute: number;
  priceDeltaPercent: number;
  degraded: boolean;
  confidence?: number;
  reason?: string;
}

export type RejectedRecordReason = "missing_name" | "invalid_price";

export interface RejectedRecord {
  rowNumber: number;
  id?: string;
  reason: RejectedRecordReason;
}

export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface RunLogRow {
  runId: string;
  seq: number;
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload: Record<string, unknown>;
  timestamp: string;
}
