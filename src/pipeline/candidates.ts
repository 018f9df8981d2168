import type { CandidateShortlistEntry, NormalizedProduct } from "../types.js";
import { roundTo } from "../utils/text.js";
import { nameSimilarity } from "./attribute-scorer.js";

export interface CandidateOptions {
  k: number;
  minScore: number;
  brandBoost: number;
  categoryBoost: number;
  /** Canonical target brands the retailer stocks as a substitute for the source brand. */
  preferredBrands?: readonly string[];
  preferredBrandBoost?: number;
}

export const DEFAULT_BRAND_BOOST = 10;
export const DEFAULT_CATEGORY_BOOST = 5;
export const DEFAULT_PREFERRED_BRAND_BOOST = 20;

export function prefilterScore(
  source: NormalizedProduct,
  target: NormalizedProduct,
  options: Omit<CandidateOptions, "k" | "minScore">,
): number {
  let score = nameSimilarity(source.canonical.name ?? "", target.canonical.name ?? "");

  const sourceBrand = source.canonical.brand;
  const targetBrand = target.canonical.brand;
  if (sourceBrand && sourceBrand === targetBrand) {
    score += options.brandBoost;
  }

  const sourceCategory = source.canonical.category;
  if (sourceCategory && sourceCategory === target.canonical.category) {
    score += options.categoryBoost;
  }

  if (targetBrand && options.preferredBrands?.includes(targetBrand)) {
    score += options.preferredBrandBoost ?? DEFAULT_PREFERRED_BRAND_BOOST;
  }

  return roundTo(Math.min(100, score), 2);
}

/**
 * Cheap name-level shortlist. Full attribute scoring and vetoes only run on
 * what survives here.
 */
export function generateCandidates(
  source: NormalizedProduct,
  targets: readonly NormalizedProduct[],
  options: CandidateOptions,
): CandidateShortlistEntry[] {
  if (options.k <= 0) {
    return [];
  }

  const entries: CandidateShortlistEntry[] = [];
  targets.forEach((target, targetIndex) => {
    const score = prefilterScore(source, target, options);
    if (score >= options.minScore) {
      entries.push({ target, targetIndex, prefilterScore: score });
    }
  });

  entries.sort(
    (left, right) => right.prefilterScore - left.prefilterScore || left.targetIndex - right.targetIndex,
  );
  return entries.slice(0, options.k);
}
