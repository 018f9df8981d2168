import type { RunLogger } from "../logging/run-logger.js";
import type {
  MatchCandidate,
  NormalizedProduct,
  ReRankOutcome,
  ReRankProvider,
  ReRankRequest,
} from "../types.js";
import { withAbortableTimeout } from "../utils/timeout.js";

export interface ReRankSettings {
  provider?: ReRankProvider;
  timeoutMs: number;
  /** Picks below this confidence (0-100) fall back to the weighted ranking. */
  minConfidence: number;
  logger?: RunLogger;
}

export interface ReRankStepResult {
  outcome: ReRankOutcome;
  degraded: boolean;
}

export function isEligible(candidate: MatchCandidate): candidate is MatchCandidate & { aggregateScore: number } {
  return candidate.aggregateScore !== null && candidate.conflictReasons.length === 0;
}

/**
 * Asks the provider to pick among the surviving shortlist. The provider only
 * ever sees candidates that passed the veto, so a pick can never resurrect a
 * conflicting pair.
 */
export async function rerankCandidates(
  source: NormalizedProduct,
  candidates: readonly MatchCandidate[],
  targets: readonly NormalizedProduct[],
  settings: ReRankSettings,
): Promise<ReRankStepResult> {
  const eligible = candidates.filter(isEligible);
  const provider = settings.provider;
  if (!provider || eligible.length === 0) {
    return { outcome: { kind: "skipped" }, degraded: false };
  }

  const request: ReRankRequest = {
    source,
    candidates: eligible.map((candidate) => ({
      target: targets[candidate.targetIndex],
      aggregateScore: candidate.aggregateScore,
    })),
  };

  const sourceId = source.product.id;
  try {
    const verdict = await withAbortableTimeout(
      (signal) => provider.rerank({ ...request, signal }),
      settings.timeoutMs,
      "rerank_provider_timeout",
    );

    if (verdict.kind === "no_match") {
      settings.logger?.info("rerank", "provider.rerank.no_match", "Re-ranker rejected every candidate.", {
        source_id: sourceId,
        reason: verdict.reason,
      });
      return { outcome: { kind: "rejected", reason: verdict.reason }, degraded: false };
    }

    if (!eligible.some((candidate) => candidate.targetId === verdict.targetId)) {
      throw new Error(`rerank_unknown_target:${verdict.targetId}`);
    }

    if (verdict.confidence < settings.minConfidence) {
      settings.logger?.debug("rerank", "provider.rerank.low_confidence", "Re-ranker pick below confidence gate.", {
        source_id: sourceId,
        target_id: verdict.targetId,
        confidence: verdict.confidence,
        min_confidence: settings.minConfidence,
      });
      return { outcome: { kind: "skipped" }, degraded: false };
    }

    return {
      outcome: {
        kind: "picked",
        targetId: verdict.targetId,
        confidence: verdict.confidence,
        reason: verdict.reason,
      },
      degraded: false,
    };
  } catch (error) {
    settings.logger?.warn("rerank", "provider.rerank.failed", "Re-ranker failed; using weighted ranking.", {
      source_id: sourceId,
      candidate_count: eligible.length,
      error_message: error instanceof Error ? error.message : String(error),
    });
    return { outcome: { kind: "skipped" }, degraded: true };
  }
}
