import type { AttributeScores, ScoredAttribute, WeightTable } from "../types.js";
import { SCORED_ATTRIBUTES } from "../types.js";

function weightEntries(weights: WeightTable): Array<[ScoredAttribute, number]> {
  const entries: Array<[ScoredAttribute, number]> = [];
  for (const attribute of SCORED_ATTRIBUTES) {
    const weight = weights[attribute];
    if (weight !== undefined) {
      entries.push([attribute, weight]);
    }
  }
  return entries;
}

export function validateWeightTable(weights: WeightTable, label = "weights"): void {
  let total = 0;
  for (const [attribute, weight] of weightEntries(weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new Error(`Invalid rule table: ${label}.${attribute} must be a finite, non-negative number (got ${weight}).`);
    }
    total += weight;
  }

  if (total <= 0) {
    throw new Error(`Invalid rule table: ${label} must sum to a positive total.`);
  }
}

/**
 * Weighted mean over the attributes that are present on both sides. Absent
 * attributes leave both the numerator and the denominator, so a missing image
 * does not pull a pair down. Returns null when nothing weighted is present.
 */
export function aggregateScores(scores: AttributeScores, weights: WeightTable): number | null {
  let weighted = 0;
  let totalWeight = 0;

  for (const [attribute, weight] of weightEntries(weights)) {
    const score = scores[attribute];
    if (!score || score.kind === "absent" || weight <= 0) {
      continue;
    }

    weighted += weight * score.value;
    totalWeight += weight;
  }

  if (totalWeight === 0) {
    return null;
  }

  return Math.max(0, Math.min(100, weighted / totalWeight));
}
