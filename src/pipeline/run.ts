import pLimit from "p-limit";
import type { RunLogger } from "../logging/run-logger.js";
import { preferredTargetBrands, type RuleSet } from "../rules/load.js";
import type {
  AttributeScoreValue,
  CandidateShortlistEntry,
  MatchCandidate,
  MatchMode,
  MatchResult,
  NormalizedProduct,
  Product,
  RejectedRecord,
  ReRankProvider,
  SourceDecision,
  VisualSimilarityProvider,
} from "../types.js";
import { withAbortableTimeout } from "../utils/timeout.js";
import { assembleMatches } from "./assembler.js";
import { ABSENT, present } from "./attribute-scorer.js";
import { DEFAULT_BRAND_BOOST, DEFAULT_CATEGORY_BOOST, generateCandidates } from "./candidates.js";
import { buildDescriptionIndex } from "./description-index.js";
import { scoreHouseBrandPair, type HouseBrandContext } from "./house-brand.js";
import { normalizeCatalog } from "./normalizer.js";
import { rerankCandidates } from "./rerank.js";
import { partitionProducts } from "./validate.js";
import { scoreWeightedPair } from "./weighted-matcher.js";

export interface MatchSettings {
  mode: MatchMode;
  /** Retailer whose cross-brand preferences apply in house brand mode. */
  retailer?: string;
  candidateTopK: number;
  candidateMinScore: number;
  acceptanceThreshold: number;
  houseBrandAcceptanceThreshold: number;
  dimensionTolerance: number;
  priceTolerance: number;
  sizeTolerance: number;
  providerTimeoutMs: number;
  rerankMinConfidence: number;
  concurrency: number;
  oneToOne: boolean;
}

export interface MatchProviders {
  rerank?: ReRankProvider;
  visual?: VisualSimilarityProvider;
  /** Call counters, logged once when the run completes. */
  stats?: () => Record<string, number>;
}

export interface MatchRunInput {
  sources: readonly Product[];
  targets: readonly Product[];
  rules: RuleSet;
  settings: MatchSettings;
  providers?: MatchProviders;
  logger?: RunLogger;
}

export interface MatchRunOutput {
  results: MatchResult[];
  decisions: SourceDecision[];
  rejected: {
    sources: RejectedRecord[];
    targets: RejectedRecord[];
  };
}

function compareCandidates(left: MatchCandidate, right: MatchCandidate): number {
  const leftScore = left.aggregateScore ?? -1;
  const rightScore = right.aggregateScore ?? -1;
  return rightScore - leftScore || left.targetIndex - right.targetIndex;
}

async function scoreImage(
  source: NormalizedProduct,
  entry: CandidateShortlistEntry,
  input: MatchRunInput,
): Promise<AttributeScoreValue> {
  const provider = input.providers?.visual;
  const sourceRef = source.product.imageRef;
  const targetRef = entry.target.product.imageRef;
  if (!provider || !sourceRef || !targetRef) {
    return ABSENT;
  }

  try {
    const similarity = await withAbortableTimeout(
      (signal) => provider.compareImages({ sourceRef, targetRef, signal }),
      input.settings.providerTimeoutMs,
      "visual_provider_timeout",
    );
    if (!Number.isFinite(similarity)) {
      throw new Error(`visual_provider_invalid_score:${String(similarity)}`);
    }
    return present(similarity);
  } catch (error) {
    input.logger?.warn("scoring", "provider.image.failed", "Image similarity failed; treating image as absent.", {
      source_id: source.product.id,
      target_id: entry.target.product.id,
      error_message: error instanceof Error ? error.message : String(error),
    });
    return ABSENT;
  }
}

async function decideSource(
  source: NormalizedProduct,
  targets: readonly NormalizedProduct[],
  context: HouseBrandContext,
  input: MatchRunInput,
): Promise<SourceDecision> {
  const { settings, rules } = input;
  const houseBrand = settings.mode === "house_brand";
  const retailer = settings.retailer ?? source.product.retailer;

  const shortlist = generateCandidates(source, targets, {
    k: settings.candidateTopK,
    minScore: settings.candidateMinScore,
    brandBoost: houseBrand ? 0 : DEFAULT_BRAND_BOOST,
    categoryBoost: DEFAULT_CATEGORY_BOOST,
    preferredBrands: houseBrand ? preferredTargetBrands(rules, retailer, source.canonical.brand) : undefined,
  });

  const scoreImages = !houseBrand && (rules.weights.image ?? 0) > 0;
  const candidates: MatchCandidate[] = [];
  for (const entry of shortlist) {
    if (houseBrand) {
      candidates.push(scoreHouseBrandPair(source, entry, context));
      continue;
    }

    const image = scoreImages ? await scoreImage(source, entry, input) : ABSENT;
    candidates.push(scoreWeightedPair(source, entry, context, image));
  }
  candidates.sort(compareCandidates);

  for (const candidate of candidates) {
    if (candidate.conflictReasons.length > 0) {
      input.logger?.debug("scoring", "candidate.vetoed", "Candidate vetoed by conflict rules.", {
        source_id: candidate.sourceId,
        target_id: candidate.targetId,
        reasons: candidate.conflictReasons,
      });
    }
  }

  const rerank = await rerankCandidates(source, candidates, targets, {
    provider: input.providers?.rerank,
    timeoutMs: settings.providerTimeoutMs,
    minConfidence: settings.rerankMinConfidence,
    logger: input.logger,
  });

  return {
    source,
    mode: settings.mode,
    candidates,
    rerank: rerank.outcome,
    degraded: rerank.degraded,
  };
}

/**
 * Matches every valid source product against the target catalog. Scoring is
 * synchronous; only provider calls are awaited, and per-source work shares no
 * mutable state, so the limiter only bounds provider fan-out.
 */
export async function runMatching(input: MatchRunInput): Promise<MatchRunOutput> {
  const { settings, rules, logger } = input;
  const startedAt = Date.now();

  const sourceSplit = partitionProducts(input.sources);
  const targetSplit = partitionProducts(input.targets);
  for (const [side, rejected] of [
    ["source", sourceSplit.rejected],
    ["target", targetSplit.rejected],
  ] as const) {
    if (rejected.length > 0) {
      logger?.warn("validation", "records.rejected", `Rejected malformed ${side} records.`, {
        side,
        rejected_count: rejected.length,
        rejected,
      });
    }
  }

  logger?.info("matching", "run.started", "Matching run started.", {
    mode: settings.mode,
    rules_version: rules.version,
    source_count: sourceSplit.valid.length,
    target_count: targetSplit.valid.length,
    rerank_enabled: Boolean(input.providers?.rerank),
    image_similarity_enabled: Boolean(input.providers?.visual),
    one_to_one: settings.oneToOne,
  });

  const sources = normalizeCatalog(sourceSplit.valid, rules);
  const targets = normalizeCatalog(targetSplit.valid, rules);
  const context: HouseBrandContext = {
    rules,
    descriptionIndex: buildDescriptionIndex([...sources, ...targets]),
    dimensionTolerance: settings.dimensionTolerance,
    priceTolerance: settings.priceTolerance,
    sizeTolerance: settings.sizeTolerance,
  };

  const limiter = pLimit(Math.max(1, Math.floor(settings.concurrency)));
  let done = 0;
  const decisions = await Promise.all(
    sources.map((source) =>
      limiter(async () => {
        const decision = await decideSource(source, targets, context, input);
        done += 1;
        if (done === sources.length || done % 50 === 0) {
          logger?.info("matching", "progress", "Matching progress.", {
            done,
            total: sources.length,
          });
        }
        return decision;
      }),
    ),
  );

  const results = assembleMatches(decisions, {
    targets,
    acceptanceThreshold:
      settings.mode === "house_brand" ? settings.houseBrandAcceptanceThreshold : settings.acceptanceThreshold,
    oneToOne: settings.oneToOne,
  });

  logger?.info("matching", "run.completed", "Matching run completed.", {
    matched_count: results.length,
    unmatched_count: sources.length - results.length,
    ai_reranked_count: results.filter((result) => result.method === "ai_reranked").length,
    degraded_count: decisions.filter((decision) => decision.degraded).length,
    elapsed_ms: Date.now() - startedAt,
  });

  const providerStats = input.providers?.stats?.();
  if (providerStats) {
    logger?.info("matching", "provider.stats", "Provider call counters.", providerStats);
  }

  return {
    results,
    decisions,
    rejected: {
      sources: sourceSplit.rejected,
      targets: targetSplit.rejected,
    },
  };
}
