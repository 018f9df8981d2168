import type { AppConfig } from "../config.js";
import { OpenAIMatchProvider, type OpenAITelemetryCallback } from "../services/openai.js";
import type { MatchMode } from "../types.js";
import type { MatchProviders, MatchSettings } from "./run.js";

export interface MatchOverrides {
  mode: MatchMode;
  retailer?: string;
  oneToOne?: boolean;
}

export function parseMatchMode(value: string | undefined): MatchMode {
  if (value === undefined || value === "weighted") {
    return "weighted";
  }
  if (value === "house-brand" || value === "house_brand") {
    return "house_brand";
  }
  throw new Error(`Invalid --mode value: ${value}. Expected weighted or house-brand.`);
}

export function buildMatchSettings(config: AppConfig, overrides: MatchOverrides): MatchSettings {
  return {
    mode: overrides.mode,
    retailer: overrides.retailer,
    candidateTopK: config.CANDIDATE_TOP_K,
    candidateMinScore: config.CANDIDATE_MIN_SCORE,
    acceptanceThreshold: config.ACCEPTANCE_THRESHOLD,
    houseBrandAcceptanceThreshold: config.HOUSE_BRAND_ACCEPTANCE_THRESHOLD,
    dimensionTolerance: config.DIMENSION_TOLERANCE,
    priceTolerance: config.HOUSE_BRAND_PRICE_TOLERANCE,
    sizeTolerance: config.HOUSE_BRAND_SIZE_TOLERANCE,
    providerTimeoutMs: config.PROVIDER_TIMEOUT_MS,
    rerankMinConfidence: config.RERANK_MIN_CONFIDENCE,
    concurrency: config.CONCURRENCY,
    oneToOne: overrides.oneToOne ?? config.ONE_TO_ONE,
  };
}

/** Providers are only constructed when a feature flag asks for them. */
export function createProviders(config: AppConfig, telemetry?: OpenAITelemetryCallback): MatchProviders {
  if (!config.OPENAI_API_KEY || (!config.RERANK_ENABLED && !config.IMAGE_SIMILARITY_ENABLED)) {
    return {};
  }

  const provider = new OpenAIMatchProvider({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    llmModel: config.LLM_MODEL,
    visionModel: config.VISION_MODEL,
    // The engine bounds the whole call by the same budget; only fast failures such as 429 get retried inside it.
    timeoutMs: config.PROVIDER_TIMEOUT_MS,
    maxRetries: config.OPENAI_MAX_RETRIES,
    retryBaseMs: config.OPENAI_RETRY_BASE_MS,
    retryMaxMs: config.OPENAI_RETRY_MAX_MS,
    telemetry,
  });

  return {
    rerank: config.RERANK_ENABLED ? provider : undefined,
    visual: config.IMAGE_SIMILARITY_ENABLED ? provider : undefined,
    stats: () => provider.getStats(),
  };
}
