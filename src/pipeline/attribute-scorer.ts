import * as fuzz from "fuzzball";
import type { AttributeScoreValue, AttributeScores, NormalizedProduct, TextAttribute } from "../types.js";
import { roundTo } from "../utils/text.js";
import { descriptionSimilarity, type DescriptionIndex } from "./description-index.js";

export const IDENTIFIER_FUZZY_CAP = 90;
export const AXIS_COUNT_MISMATCH_SCORE = 20;
export const OUT_OF_TOLERANCE_CEILING = 60;

const FUZZ_OPTIONS = { full_process: false };

export interface ScoringContext {
  descriptionIndex: DescriptionIndex;
  /** Relative tolerance per dimension axis, e.g. 0.05. */
  dimensionTolerance: number;
}

export const ABSENT: AttributeScoreValue = Object.freeze({ kind: "absent" });

export function present(value: number): AttributeScoreValue {
  return { kind: "present", value: roundTo(Math.max(0, Math.min(100, value)), 2) };
}

/** Word-order-insensitive blend, so "Shelf Steel 5 tier" and "steel shelf 5 tier" score alike. */
export function nameSimilarity(left: string, right: string): number {
  if (!left || !right) {
    return 0;
  }
  if (left === right) {
    return 100;
  }

  const sorted = fuzz.token_sort_ratio(left, right, FUZZ_OPTIONS);
  const set = fuzz.token_set_ratio(left, right, FUZZ_OPTIONS);
  return roundTo(0.4 * sorted + 0.6 * set, 2);
}

export function identifierSimilarity(left: string, right: string): number {
  if (left === right) {
    return 100;
  }
  return Math.min(IDENTIFIER_FUZZY_CAP, fuzz.ratio(left, right, FUZZ_OPTIONS));
}

/**
 * Axes are compared largest to largest, since retailers disagree on whether
 * width or depth comes first.
 */
export function dimensionSimilarity(left: number[], right: number[], tolerance: number): number {
  if (left.length !== right.length) {
    return AXIS_COUNT_MISMATCH_SCORE;
  }

  const a = [...left].sort((x, y) => y - x);
  const b = [...right].sort((x, y) => y - x);
  let worst = 0;
  for (let index = 0; index < a.length; index += 1) {
    const larger = Math.max(a[index], b[index]);
    const difference = larger === 0 ? 0 : Math.abs(a[index] - b[index]) / larger;
    worst = Math.max(worst, difference);
  }

  if (worst <= tolerance) {
    const ratio = tolerance === 0 ? 0 : worst / tolerance;
    return roundTo(100 - 10 * ratio, 2);
  }

  return roundTo(OUT_OF_TOLERANCE_CEILING * (1 - worst), 2);
}

export function scoreAttribute(
  attribute: TextAttribute,
  source: NormalizedProduct,
  target: NormalizedProduct,
  context: ScoringContext,
): AttributeScoreValue {
  const left = source.canonical[attribute];
  const right = target.canonical[attribute];
  if (!left || !right) {
    return ABSENT;
  }

  switch (attribute) {
    case "name":
      return present(nameSimilarity(left, right));
    case "description":
      return present(descriptionSimilarity(left, right, context.descriptionIndex));
    case "dimensions":
      if (source.dimensionAxes && target.dimensionAxes) {
        return present(dimensionSimilarity(source.dimensionAxes, target.dimensionAxes, context.dimensionTolerance));
      }
      return present(identifierSimilarity(left, right));
    case "brand":
    case "model":
    case "category":
    case "material":
    case "color":
      return present(identifierSimilarity(left, right));
  }
}

export function scoreAttributes(
  source: NormalizedProduct,
  target: NormalizedProduct,
  attributes: readonly TextAttribute[],
  context: ScoringContext,
): AttributeScores {
  const scores: AttributeScores = {};
  for (const attribute of attributes) {
    scores[attribute] = scoreAttribute(attribute, source, target, context);
  }
  return scores;
}
