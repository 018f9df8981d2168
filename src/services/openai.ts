import OpenAI from "openai";
import { z } from "zod";
import type {
  ImageCompareRequest,
  ReRankProvider,
  ReRankRequest,
  ReRankVerdict,
  RunLogLevel,
  VisualSimilarityProvider,
} from "../types.js";
import { delay, withTimeout } from "../utils/timeout.js";

const rerankSchema = z.object({
  match_index: z.number().int().nullable(),
  confidence: z.number(),
  reason: z.string().default(""),
});

const imageSimilaritySchema = z.object({
  similarity: z.number(),
});

const TIMEOUT_MESSAGE = "openai_request_timeout";
const ABORTED_MESSAGE = "openai_request_aborted";

type CallKind = "rerank" | "image_compare";

export interface OpenAIMatchProviderOptions {
  apiKey: string;
  /** Any OpenAI-compatible endpoint. */
  baseURL?: string;
  llmModel: string;
  visionModel: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  telemetry?: OpenAITelemetryCallback;
}

export type OpenAIProviderStats = {
  rerank_call_count: number;
  image_compare_call_count: number;
  retry_count: number;
  timeout_count: number;
  request_failure_count: number;
};

export interface OpenAITelemetryEvent {
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload?: Record<string, unknown>;
}

export type OpenAITelemetryCallback = (event: OpenAITelemetryEvent) => void;

function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, value));
}

function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.message.includes(TIMEOUT_MESSAGE);
}

function isRetryableError(error: unknown): boolean {
  if (isTimeoutError(error)) {
    return true;
  }

  if (typeof error === "object" && error !== null) {
    const status = (error as { status?: unknown }).status;
    if (typeof status === "number" && (status === 429 || status >= 500)) {
      return true;
    }

    const code = (error as { code?: unknown }).code;
    if (typeof code === "string" && ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(code)) {
      return true;
    }

    const message = (error as { message?: unknown }).message;
    if (typeof message === "string") {
      const normalized = message.toLowerCase();
      if (
        normalized.includes("timed out") ||
        normalized.includes("rate limit") ||
        normalized.includes("too many requests")
      ) {
        return true;
      }
    }
  }

  return false;
}

function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const maybeError = error as Error & {
      status?: number;
      code?: string;
    };
    return {
      name: maybeError.name,
      message: maybeError.message,
      status: maybeError.status ?? null,
      code: maybeError.code ?? null,
    };
  }

  if (typeof error === "object" && error !== null) {
    return JSON.parse(JSON.stringify(error)) as Record<string, unknown>;
  }

  return {
    message: String(error),
  };
}

function parseJsonContent<T>(content: string | null | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content ?? "{}");
  } catch {
    throw new Error("openai_invalid_json_response");
  }
  return schema.parse(parsed);
}

function describeCandidate(request: ReRankRequest, index: number): Record<string, unknown> {
  const { target, aggregateScore } = request.candidates[index];
  return {
    index: index + 1,
    name: target.product.name,
    brand: target.product.brand ?? null,
    model: target.product.model ?? null,
    category: target.product.category ?? null,
    dimensions: target.product.dimensions ?? null,
    price: target.product.price,
    weighted_score: Math.round(aggregateScore),
  };
}

/**
 * Re-ranking and image comparison through the chat completions API. Responses
 * are JSON objects validated with zod; anything else is an error the engine
 * turns into a weighted fallback.
 */
export class OpenAIMatchProvider implements ReRankProvider, VisualSimilarityProvider {
  private readonly client: OpenAI;
  private readonly llmModel: string;
  private readonly visionModel: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;
  private readonly telemetry?: OpenAITelemetryCallback;

  private readonly stats: OpenAIProviderStats = {
    rerank_call_count: 0,
    image_compare_call_count: 0,
    retry_count: 0,
    timeout_count: 0,
    request_failure_count: 0,
  };

  constructor(options: OpenAIMatchProviderOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    this.llmModel = options.llmModel;
    this.visionModel = options.visionModel;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryBaseMs = options.retryBaseMs;
    this.retryMaxMs = options.retryMaxMs;
    this.telemetry = options.telemetry;
  }

  getStats(): OpenAIProviderStats {
    return { ...this.stats };
  }

  private emitTelemetry(event: OpenAITelemetryEvent): void {
    this.telemetry?.(event);
  }

  private async withRetry<T>(input: {
    callKind: CallKind;
    requestBody: Record<string, unknown>;
    signal?: AbortSignal;
    operation: () => Promise<T>;
    responsePayloadFactory: (response: T) => Record<string, unknown>;
  }): Promise<T> {
    const totalAttempts = this.maxRetries + 1;

    this.emitTelemetry({
      level: "debug",
      stage: "openai",
      event: "openai.call.started",
      message: `OpenAI call started (${input.callKind}).`,
      payload: {
        call_kind: input.callKind,
        total_attempts: totalAttempts,
        request_body: input.requestBody,
      },
    });

    for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
      if (input.signal?.aborted) {
        this.emitTelemetry({
          level: "debug",
          stage: "openai",
          event: "openai.call.aborted",
          message: `OpenAI call aborted by caller (${input.callKind}).`,
          payload: { call_kind: input.callKind, attempt },
        });
        throw new Error(ABORTED_MESSAGE);
      }

      const attemptStartedAt = Date.now();

      try {
        const response = await withTimeout(input.operation(), this.timeoutMs, TIMEOUT_MESSAGE);

        this.emitTelemetry({
          level: "debug",
          stage: "openai",
          event: "openai.attempt.succeeded",
          message: `OpenAI attempt succeeded (${input.callKind}).`,
          payload: {
            call_kind: input.callKind,
            attempt,
            elapsed_ms: Date.now() - attemptStartedAt,
            ...input.responsePayloadFactory(response),
          },
        });

        return response;
      } catch (error) {
        if (isTimeoutError(error)) {
          this.stats.timeout_count += 1;
        }

        const retryable = !input.signal?.aborted && isRetryableError(error);
        const errorPayload = serializeError(error);

        this.emitTelemetry({
          level: "warn",
          stage: "openai",
          event: "openai.attempt.failed",
          message: `OpenAI attempt failed (${input.callKind}).`,
          payload: {
            call_kind: input.callKind,
            attempt,
            total_attempts: totalAttempts,
            retryable,
            elapsed_ms: Date.now() - attemptStartedAt,
            error: errorPayload,
          },
        });

        if (!retryable || attempt === totalAttempts) {
          this.stats.request_failure_count += 1;

          this.emitTelemetry({
            level: "error",
            stage: "openai",
            event: "openai.call.failed",
            message: `OpenAI call failed (${input.callKind}).`,
            payload: {
              call_kind: input.callKind,
              attempt,
              total_attempts: totalAttempts,
              error: errorPayload,
            },
          });

          throw error;
        }

        this.stats.retry_count += 1;
        const baseDelay = Math.min(this.retryMaxMs, this.retryBaseMs * 2 ** (attempt - 1));
        const jitteredDelay = Math.round(baseDelay * (0.8 + Math.random() * 0.4));

        this.emitTelemetry({
          level: "warn",
          stage: "openai",
          event: "openai.retry.scheduled",
          message: `OpenAI retry scheduled (${input.callKind}).`,
          payload: {
            call_kind: input.callKind,
            attempt,
            total_attempts: totalAttempts,
            delay_ms: jitteredDelay,
          },
        });

        await delay(jitteredDelay, input.signal);
      }
    }

    throw new Error("unreachable_retry_state");
  }

  async rerank(input: ReRankRequest): Promise<ReRankVerdict> {
    if (input.candidates.length === 0) {
      return { kind: "no_match", reason: "no_candidates" };
    }

    const source = input.source.product;
    const prompt = [
      "Pick the candidate that is the same product as the source product, sold by another retailer.",
      "Brand, product line, size, capacity and variant must agree; similar wording alone is not enough.",
      "Reply with JSON only.",
      `source: ${JSON.stringify({
        name: source.name,
        brand: source.brand ?? null,
        model: source.model ?? null,
        category: source.category ?? null,
        dimensions: source.dimensions ?? null,
        price: source.price,
      })}`,
      `candidates: ${JSON.stringify(input.candidates.map((_, index) => describeCandidate(input, index)))}`,
    ].join("\n");

    this.stats.rerank_call_count += 1;
    const requestBody = {
      model: this.llmModel,
      response_format: { type: "json_object" as const },
      messages: [
        {
          role: "system" as const,
          content:
            'Return JSON {"match_index": <candidate index or null>, "confidence": <0-100>, "reason": "<short reason>"}. Use null when no candidate is the same product.',
        },
        {
          role: "user" as const,
          content: prompt,
        },
      ],
      temperature: 0,
    };

    const completion = await this.withRetry({
      callKind: "rerank",
      requestBody,
      signal: input.signal,
      operation: () => this.client.chat.completions.create(requestBody, { signal: input.signal }),
      responsePayloadFactory: (chatResponse) => ({
        response_metadata: {
          model: chatResponse.model ?? null,
          usage: chatResponse.usage ?? null,
        },
      }),
    });

    const structured = parseJsonContent(completion.choices[0]?.message?.content, rerankSchema);
    if (structured.match_index === null) {
      return { kind: "no_match", reason: structured.reason || "no_match" };
    }

    const picked = input.candidates[structured.match_index - 1];
    if (!picked) {
      throw new Error(`openai_rerank_invalid_index:${structured.match_index}`);
    }

    return {
      kind: "ranked",
      targetId: picked.target.product.id,
      confidence: clampScore(structured.confidence),
      reason: structured.reason,
    };
  }

  async compareImages(input: ImageCompareRequest): Promise<number> {
    this.stats.image_compare_call_count += 1;
    const requestBody = {
      model: this.visionModel,
      response_format: { type: "json_object" as const },
      messages: [
        {
          role: "system" as const,
          content:
            'Compare two product photos. Return JSON {"similarity": <0-100>} where 100 means the same product model.',
        },
        {
          role: "user" as const,
          content: [
            { type: "text" as const, text: "Image A is the source product, image B the candidate." },
            { type: "image_url" as const, image_url: { url: input.sourceRef } },
            { type: "image_url" as const, image_url: { url: input.targetRef } },
          ],
        },
      ],
      temperature: 0,
    };

    const completion = await this.withRetry({
      callKind: "image_compare",
      requestBody,
      signal: input.signal,
      operation: () => this.client.chat.completions.create(requestBody, { signal: input.signal }),
      responsePayloadFactory: (chatResponse) => ({
        response_metadata: {
          model: chatResponse.model ?? null,
          usage: chatResponse.usage ?? null,
        },
      }),
    });

    const structured = parseJsonContent(completion.choices[0]?.message?.content, imageSimilaritySchema);
    return clampScore(structured.similarity);
  }
}
