import type { RuleSet } from "../rules/load.js";
import type {
  AttributeScoreValue,
  CandidateShortlistEntry,
  MatchCandidate,
  NormalizedProduct,
} from "../types.js";
import { TEXT_ATTRIBUTES } from "../types.js";
import { aggregateScores } from "./aggregator.js";
import { ABSENT, scoreAttributes, type ScoringContext } from "./attribute-scorer.js";
import { detectConflicts } from "./conflicts.js";

export interface PairScoringContext extends ScoringContext {
  rules: RuleSet;
}

/** Full attribute scoring of one shortlisted pair under the default weight table. */
export function scoreWeightedPair(
  source: NormalizedProduct,
  entry: CandidateShortlistEntry,
  context: PairScoringContext,
  image: AttributeScoreValue = ABSENT,
): MatchCandidate {
  const scores = scoreAttributes(source, entry.target, TEXT_ATTRIBUTES, context);
  scores.image = image;

  return {
    sourceId: source.product.id,
    targetId: entry.target.product.id,
    targetIndex: entry.targetIndex,
    prefilterScore: entry.prefilterScore,
    scores,
    aggregateScore: aggregateScores(scores, context.rules.weights),
    conflictReasons: detectConflicts(source, entry.target, context.rules.conflictRules),
  };
}
