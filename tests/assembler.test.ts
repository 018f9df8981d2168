import { describe, expect, it } from "vitest";
import { assembleMatches } from "../src/pipeline/assembler.js";
import type { MatchCandidate, NormalizedProduct, ReRankOutcome, SourceDecision } from "../src/types.js";

function normalized(id: string, price: number): NormalizedProduct {
  return {
    product: { id, name: id, price },
    canonical: { name: id },
    specs: {},
    dimensionAxes: null,
  };
}

const targets = [normalized("t0", 120), normalized("t1", 90), normalized("t2", 100)];

function candidate(
  sourceId: string,
  targetIndex: number,
  aggregateScore: number | null,
  conflictReasons: string[] = [],
): MatchCandidate {
  return {
    sourceId,
    targetId: targets[targetIndex].product.id,
    targetIndex,
    prefilterScore: 50,
    scores: {},
    aggregateScore,
    conflictReasons,
  };
}

function decision(
  sourceId: string,
  candidates: MatchCandidate[],
  rerank: ReRankOutcome = { kind: "skipped" },
  degraded = false,
): SourceDecision {
  return {
    source: normalized(sourceId, 100),
    mode: "weighted",
    candidates,
    rerank,
    degraded,
  };
}

describe("result assembler", () => {
  it("skips vetoed and unscored candidates and reports the price delta", () => {
    const results = assembleMatches(
      [
        decision("s1", [
          candidate("s1", 1, 99, ["strict_spec:tiers[5 vs 4]"]),
          candidate("s1", 2, null),
          candidate("s1", 0, 80),
        ]),
      ],
      { targets, acceptanceThreshold: 70 },
    );

    expect(results).toEqual([
      {
        sourceId: "s1",
        targetId: "t0",
        aggregateScore: 80,
        method: "weighted",
        priceDeltaAbsolute: 20,
        priceDeltaPercent: 20,
        degraded: false,
      },
    ]);
  });

  it("emits nothing below the acceptance threshold", () => {
    expect(assembleMatches([decision("s1", [candidate("s1", 0, 69.99)])], { targets, acceptanceThreshold: 70 })).toEqual(
      [],
    );
  });

  it("puts a re-ranker pick ahead of a higher weighted score", () => {
    const results = assembleMatches(
      [
        decision("s1", [candidate("s1", 0, 90), candidate("s1", 1, 60)], {
          kind: "picked",
          targetId: "t1",
          confidence: 82,
          reason: "same pack size",
        }),
      ],
      { targets, acceptanceThreshold: 70 },
    );

    expect(results).toEqual([
      {
        sourceId: "s1",
        targetId: "t1",
        aggregateScore: 60,
        method: "ai_reranked",
        priceDeltaAbsolute: -10,
        priceDeltaPercent: -10,
        degraded: false,
        confidence: 82,
        reason: "same pack size",
      },
    ]);
  });

  it("suppresses a source the re-ranker rejected", () => {
    const results = assembleMatches(
      [decision("s1", [candidate("s1", 0, 95)], { kind: "rejected", reason: "different finish" })],
      { targets, acceptanceThreshold: 70 },
    );

    expect(results).toEqual([]);
  });

  it("carries the degraded flag through", () => {
    const results = assembleMatches([decision("s1", [candidate("s1", 2, 75.456)], { kind: "skipped" }, true)], {
      targets,
      acceptanceThreshold: 70,
    });

    expect(results.map((result) => [result.targetId, result.aggregateScore, result.degraded])).toEqual([
      ["t2", 75.46, true],
    ]);
  });

  it("lets several sources share a target unless one-to-one is on", () => {
    const decisions = [
      decision("s1", [candidate("s1", 0, 80), candidate("s1", 2, 75)]),
      decision("s2", [candidate("s2", 0, 92)]),
    ];

    const shared = assembleMatches(decisions, { targets, acceptanceThreshold: 70 });
    expect(shared.map((result) => [result.sourceId, result.targetId])).toEqual([
      ["s1", "t0"],
      ["s2", "t0"],
    ]);

    const exclusive = assembleMatches(decisions, { targets, acceptanceThreshold: 70, oneToOne: true });
    expect(exclusive.map((result) => [result.sourceId, result.targetId])).toEqual([
      ["s1", "t2"],
      ["s2", "t0"],
    ]);
  });
});
