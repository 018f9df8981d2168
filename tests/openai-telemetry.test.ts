import { describe, expect, it } from "vitest";
import { rerankCandidates } from "../src/pipeline/rerank.js";
import { OpenAIMatchProvider, type OpenAITelemetryEvent } from "../src/services/openai.js";
import type { MatchCandidate, NormalizedProduct, ReRankRequest } from "../src/types.js";
import { delay } from "../src/utils/timeout.js";

function createProvider(events: OpenAITelemetryEvent[], maxRetries = 1): OpenAIMatchProvider {
  return new OpenAIMatchProvider({
    apiKey: "test-secret",
    llmModel: "gpt-4.1-mini",
    visionModel: "gpt-4.1-mini",
    timeoutMs: 10_000,
    maxRetries,
    retryBaseMs: 1,
    retryMaxMs: 2,
    telemetry: (event) => events.push(event),
  });
}

type CreateStub = (body: unknown, options?: { signal?: AbortSignal }) => Promise<unknown>;

function stubCompletions(provider: OpenAIMatchProvider, create: CreateStub): void {
  (provider as unknown as { client: unknown }).client = {
    chat: {
      completions: { create },
    },
  };
}

function completion(content: Record<string, unknown>) {
  return {
    model: "gpt-4.1-mini",
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    choices: [{ message: { content: JSON.stringify(content) } }],
  };
}

function normalized(id: string, name: string, price: number): NormalizedProduct {
  return {
    product: { id, name, price },
    canonical: { name: name.toLowerCase() },
    specs: {},
    dimensionAxes: null,
  };
}

const request: ReRankRequest = {
  source: normalized("s1", "TOA SuperShield 9L", 2590),
  candidates: [
    { target: normalized("t1", "TOA SuperShield Exterior 9L", 2390), aggregateScore: 92.4 },
    { target: normalized("t2", "TOA SuperShield Gloss 9L", 2450), aggregateScore: 88.1 },
  ],
};

describe("openai match provider", () => {
  it("maps a 1-based pick to the candidate target and records telemetry", async () => {
    const events: OpenAITelemetryEvent[] = [];
    const provider = createProvider(events);
    stubCompletions(provider, async () => completion({ match_index: 2, confidence: 140, reason: "same sheen" }));

    const verdict = await provider.rerank(request);

    expect(verdict).toEqual({ kind: "ranked", targetId: "t2", confidence: 100, reason: "same sheen" });

    const started = events.find((event) => event.event === "openai.call.started");
    const succeeded = events.find((event) => event.event === "openai.attempt.succeeded");
    expect(started?.payload?.call_kind).toBe("rerank");
    expect(started?.payload?.total_attempts).toBe(2);
    expect(succeeded?.payload?.response_metadata).toEqual({
      model: "gpt-4.1-mini",
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
    expect(provider.getStats().rerank_call_count).toBe(1);
  });

  it("returns no_match for a null index", async () => {
    const provider = createProvider([]);
    stubCompletions(provider, async () => completion({ match_index: null, confidence: 90, reason: "" }));

    expect(await provider.rerank(request)).toEqual({ kind: "no_match", reason: "no_match" });
    expect(await provider.rerank({ source: request.source, candidates: [] })).toEqual({
      kind: "no_match",
      reason: "no_candidates",
    });
  });

  it("throws on an index outside the candidate list", async () => {
    const provider = createProvider([]);
    stubCompletions(provider, async () => completion({ match_index: 3, confidence: 70, reason: "third" }));

    await expect(provider.rerank(request)).rejects.toThrow("openai_rerank_invalid_index:3");
  });

  it("retries rate limited attempts", async () => {
    const events: OpenAITelemetryEvent[] = [];
    const provider = createProvider(events);

    let attempts = 0;
    stubCompletions(provider, async () => {
      attempts += 1;
      if (attempts === 1) {
        throw { status: 429, message: "rate limit" };
      }
      return completion({ match_index: 1, confidence: 81, reason: "same product" });
    });

    const verdict = await provider.rerank(request);

    expect(verdict).toEqual({ kind: "ranked", targetId: "t1", confidence: 81, reason: "same product" });
    expect(attempts).toBe(2);
    expect(events.map((event) => event.event)).toEqual([
      "openai.call.started",
      "openai.attempt.failed",
      "openai.retry.scheduled",
      "openai.attempt.succeeded",
    ]);
    expect(provider.getStats().retry_count).toBe(1);
  });

  it("does not retry a non-retryable failure", async () => {
    const events: OpenAITelemetryEvent[] = [];
    const provider = createProvider(events, 3);
    stubCompletions(provider, async () => {
      throw Object.assign(new Error("invalid api key"), { status: 401 });
    });

    await expect(provider.rerank(request)).rejects.toThrow("invalid api key");
    expect(provider.getStats()).toMatchObject({ retry_count: 0, request_failure_count: 1 });
    expect(events.at(-1)?.event).toBe("openai.call.failed");
  });

  it("rejects responses that are not JSON", async () => {
    const provider = createProvider([]);
    stubCompletions(provider, async () => ({ choices: [{ message: { content: "the second one" } }] }));

    await expect(provider.rerank(request)).rejects.toThrow("openai_invalid_json_response");
  });

  it("sends both images and clamps the similarity", async () => {
    const bodies: unknown[] = [];
    const provider = createProvider([]);
    stubCompletions(provider, async (body) => {
      bodies.push(body);
      return completion({ similarity: 104 });
    });

    const similarity = await provider.compareImages({
      sourceRef: "https://img.example.test/a.jpg",
      targetRef: "https://img.example.test/b.jpg",
    });

    expect(similarity).toBe(100);
    expect(bodies).toHaveLength(1);
    expect(JSON.stringify(bodies[0])).toContain('"image_url":{"url":"https://img.example.test/b.jpg"}');
    expect(provider.getStats().image_compare_call_count).toBe(1);
  });

  it("stops calling the API once the re-rank step stops waiting", async () => {
    const events: OpenAITelemetryEvent[] = [];
    const provider = createProvider(events, 3);
    const signals: AbortSignal[] = [];
    stubCompletions(provider, (_body, options) => {
      const signal = options?.signal;
      if (signal) {
        signals.push(signal);
      }
      return new Promise((_, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("Request was aborted.")), { once: true });
      });
    });

    const targets = request.candidates.map((entry) => entry.target);
    const shortlist: MatchCandidate[] = targets.map((target, index) => ({
      sourceId: "s1",
      targetId: target.product.id,
      targetIndex: index,
      prefilterScore: 90,
      scores: {},
      aggregateScore: 90 - index,
      conflictReasons: [],
    }));

    const step = await rerankCandidates(request.source, shortlist, targets, {
      provider,
      timeoutMs: 30,
      minConfidence: 60,
    });
    await delay(60);

    expect(step).toEqual({ outcome: { kind: "skipped" }, degraded: true });
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(provider.getStats()).toMatchObject({ retry_count: 0, request_failure_count: 1 });
    expect(events.map((event) => event.event)).toEqual([
      "openai.call.started",
      "openai.attempt.failed",
      "openai.call.failed",
    ]);
  });

  it("makes no request when the caller has already given up", async () => {
    const events: OpenAITelemetryEvent[] = [];
    const provider = createProvider(events);
    let calls = 0;
    stubCompletions(provider, async () => {
      calls += 1;
      return completion({ match_index: 1, confidence: 90, reason: "same" });
    });

    await expect(provider.rerank({ ...request, signal: AbortSignal.abort() })).rejects.toThrow(
      "openai_request_aborted",
    );
    expect(calls).toBe(0);
    expect(events.at(-1)?.event).toBe("openai.call.aborted");
  });
});
