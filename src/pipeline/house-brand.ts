import type {
  AttributeScoreValue,
  AttributeScores,
  CandidateShortlistEntry,
  MatchCandidate,
  NormalizedProduct,
  SpecKey,
  SpecValue,
} from "../types.js";
import { SPEC_KEYS } from "../types.js";
import { roundTo } from "../utils/text.js";
import { aggregateScores } from "./aggregator.js";
import { ABSENT, present, scoreAttribute } from "./attribute-scorer.js";
import { detectConflicts } from "./conflicts.js";
import type { PairScoringContext } from "./weighted-matcher.js";

export interface HouseBrandContext extends PairScoringContext {
  /** Relative price gap that still scores 100, e.g. 0.3. */
  priceTolerance: number;
  /** Relative size gap for soft specs, e.g. 0.1. */
  sizeTolerance: number;
}

const HOUSE_BRAND_TEXT_ATTRIBUTES = ["name", "category", "dimensions", "material", "description"] as const;

export function specSimilarity(left: SpecValue, right: SpecValue, tolerance: number): number {
  if (left.unit !== right.unit) {
    return 0;
  }
  if (left.value === right.value) {
    return 100;
  }

  const difference = Math.abs(left.value - right.value) / Math.max(left.value, right.value);
  if (difference > tolerance || tolerance === 0) {
    return 0;
  }
  return roundTo(100 - 50 * (difference / tolerance), 2);
}

/**
 * Weighted mean over the soft specs both products declare. Strict specs are
 * left to the conflict rules.
 */
export function scoreSpecs(
  source: NormalizedProduct,
  target: NormalizedProduct,
  context: HouseBrandContext,
): AttributeScoreValue {
  const strict = new Set<SpecKey>(context.rules.strictSpecs);
  let weighted = 0;
  let totalWeight = 0;

  for (const key of SPEC_KEYS) {
    const weight = context.rules.houseBrandSpecWeights[key] ?? 0;
    const left = source.specs[key];
    const right = target.specs[key];
    if (weight <= 0 || strict.has(key) || !left || !right) {
      continue;
    }

    weighted += weight * specSimilarity(left, right, context.sizeTolerance);
    totalWeight += weight;
  }

  return totalWeight === 0 ? ABSENT : present(weighted / totalWeight);
}

/** 100 inside the tolerance band, linear down to 0 at twice the tolerance. */
export function priceSimilarity(sourcePrice: number, targetPrice: number, tolerance: number): number {
  if (sourcePrice <= 0 || targetPrice <= 0) {
    return 0;
  }

  const difference = Math.abs(targetPrice - sourcePrice) / sourcePrice;
  if (difference <= tolerance) {
    return 100;
  }
  if (difference >= 2 * tolerance) {
    return 0;
  }
  return roundTo((100 * (2 * tolerance - difference)) / tolerance, 2);
}

function houseBrandGates(source: NormalizedProduct, target: NormalizedProduct): string[] {
  const reasons: string[] = [];

  const sourceCategory = source.canonical.category;
  const targetCategory = target.canonical.category;
  if (sourceCategory && targetCategory && sourceCategory !== targetCategory) {
    reasons.push("category_mismatch");
  }

  const sourceBrand = source.canonical.brand;
  if (sourceBrand && sourceBrand === target.canonical.brand) {
    reasons.push("same_brand");
  }

  return reasons;
}

/**
 * Functional equivalence across brands: the brand is expected to differ, so
 * category, specs and price carry the decision.
 */
export function scoreHouseBrandPair(
  source: NormalizedProduct,
  entry: CandidateShortlistEntry,
  context: HouseBrandContext,
): MatchCandidate {
  const target = entry.target;
  const scores: AttributeScores = {};
  for (const attribute of HOUSE_BRAND_TEXT_ATTRIBUTES) {
    scores[attribute] = scoreAttribute(attribute, source, target, context);
  }
  scores.specs = scoreSpecs(source, target, context);
  scores.price = present(priceSimilarity(source.product.price, target.product.price, context.priceTolerance));

  return {
    sourceId: source.product.id,
    targetId: target.product.id,
    targetIndex: entry.targetIndex,
    prefilterScore: entry.prefilterScore,
    scores,
    aggregateScore: aggregateScores(scores, context.rules.houseBrandWeights),
    conflictReasons: [
      ...houseBrandGates(source, target),
      ...detectConflicts(source, target, context.rules.conflictRules),
    ],
  };
}
