import type { MatchCandidate, MatchMethod, MatchResult, NormalizedProduct, SourceDecision } from "../types.js";
import { roundTo } from "../utils/text.js";
import { isEligible } from "./rerank.js";

export interface AssembleOptions {
  targets: readonly NormalizedProduct[];
  acceptanceThreshold: number;
  /** Each target may be claimed by at most one source. */
  oneToOne?: boolean;
}

interface Choice {
  candidate: MatchCandidate & { aggregateScore: number };
  method: MatchMethod;
  confidence?: number;
  reason?: string;
}

function rankCandidates(candidates: readonly MatchCandidate[]): Array<MatchCandidate & { aggregateScore: number }> {
  return candidates
    .filter(isEligible)
    .sort((left, right) => right.aggregateScore - left.aggregateScore || left.targetIndex - right.targetIndex);
}

/** Acceptable targets for one source, best first. */
function choicesFor(decision: SourceDecision, acceptanceThreshold: number): Choice[] {
  if (decision.rerank.kind === "rejected") {
    return [];
  }

  const ranked = rankCandidates(decision.candidates);
  const method: MatchMethod = decision.mode === "house_brand" ? "house_brand" : "weighted";
  const choices: Choice[] = ranked
    .filter((candidate) => candidate.aggregateScore >= acceptanceThreshold)
    .map((candidate) => ({ candidate, method }));

  const rerank = decision.rerank;
  if (rerank.kind !== "picked") {
    return choices;
  }

  const picked = ranked.find((candidate) => candidate.targetId === rerank.targetId);
  if (!picked) {
    return choices;
  }

  return [
    { candidate: picked, method: "ai_reranked", confidence: rerank.confidence, reason: rerank.reason },
    ...choices.filter((choice) => choice.candidate.targetId !== picked.targetId),
  ];
}

function toResult(source: NormalizedProduct, target: NormalizedProduct, choice: Choice, degraded: boolean): MatchResult {
  const delta = target.product.price - source.product.price;
  const result: MatchResult = {
    sourceId: source.product.id,
    targetId: target.product.id,
    aggregateScore: roundTo(choice.candidate.aggregateScore, 2),
    method: choice.method,
    priceDeltaAbsolute: roundTo(delta, 2),
    priceDeltaPercent: roundTo((delta / source.product.price) * 100, 2),
    degraded,
  };

  if (choice.confidence !== undefined) {
    result.confidence = choice.confidence;
  }
  if (choice.reason !== undefined) {
    result.reason = choice.reason;
  }
  return result;
}

/**
 * Turns per-source decisions into at most one result per source, in source
 * order. Under the one-to-one policy sources claim targets in order of their
 * best score, and a source whose first choice is taken falls back to its next
 * acceptable candidate.
 */
export function assembleMatches(decisions: readonly SourceDecision[], options: AssembleOptions): MatchResult[] {
  const choiceLists = decisions.map((decision) => choicesFor(decision, options.acceptanceThreshold));
  const selected = new Map<number, Choice>();

  if (!options.oneToOne) {
    choiceLists.forEach((choices, index) => {
      if (choices.length > 0) {
        selected.set(index, choices[0]);
      }
    });
  } else {
    const order = choiceLists
      .map((choices, index) => ({ index, best: choices[0]?.candidate.aggregateScore ?? -1 }))
      .filter((entry) => entry.best >= 0)
      .sort((left, right) => right.best - left.best || left.index - right.index);

    const claimed = new Set<string>();
    for (const { index } of order) {
      const choice = choiceLists[index].find((item) => !claimed.has(item.candidate.targetId));
      if (choice) {
        claimed.add(choice.candidate.targetId);
        selected.set(index, choice);
      }
    }
  }

  const results: MatchResult[] = [];
  decisions.forEach((decision, index) => {
    const choice = selected.get(index);
    const target = choice ? options.targets[choice.candidate.targetIndex] : undefined;
    if (choice && target) {
      results.push(toResult(decision.source, target, choice, decision.degraded));
    }
  });
  return results;
}
