import "dotenv/config";
import { z } from "zod";

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

function envBoolean(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "") {
      return undefined;
    }
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    return value;
  }, z.boolean().default(defaultValue));
}

const score = z.coerce.number().min(0).max(100);
const ratio = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  VISION_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  RERANK_ENABLED: envBoolean(false),
  IMAGE_SIMILARITY_ENABLED: envBoolean(false),
  RERANK_MIN_CONFIDENCE: score.default(60),
  CANDIDATE_TOP_K: z.coerce.number().int().positive().default(10),
  CANDIDATE_MIN_SCORE: score.default(30),
  ACCEPTANCE_THRESHOLD: score.default(70),
  HOUSE_BRAND_ACCEPTANCE_THRESHOLD: score.default(60),
  HOUSE_BRAND_PRICE_TOLERANCE: ratio.default(0.3),
  HOUSE_BRAND_SIZE_TOLERANCE: ratio.default(0.1),
  DIMENSION_TOLERANCE: ratio.default(0.05),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),
  OPENAI_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  OPENAI_RETRY_BASE_MS: z.coerce.number().int().positive().default(750),
  OPENAI_RETRY_MAX_MS: z.coerce.number().int().positive().default(6_000),
  CONCURRENCY: z.coerce.number().int().positive().default(5),
  ONE_TO_ONE: envBoolean(false),
  RULES_PATH: z.string().min(1).optional(),
  OUTPUT_DIR: z.string().min(1).default("outputs"),
  LOG_FLUSH_BATCH_SIZE: z.coerce.number().int().positive().default(25),
});

export type AppConfig = z.infer<typeof envSchema>;

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${errors}`);
  }

  if (parsed.data.CANDIDATE_MIN_SCORE > parsed.data.ACCEPTANCE_THRESHOLD) {
    throw new Error(
      `Invalid environment configuration: CANDIDATE_MIN_SCORE (${parsed.data.CANDIDATE_MIN_SCORE}) must be <= ACCEPTANCE_THRESHOLD (${parsed.data.ACCEPTANCE_THRESHOLD})`,
    );
  }

  if (parsed.data.CANDIDATE_MIN_SCORE > parsed.data.HOUSE_BRAND_ACCEPTANCE_THRESHOLD) {
    throw new Error(
      `Invalid environment configuration: CANDIDATE_MIN_SCORE (${parsed.data.CANDIDATE_MIN_SCORE}) must be <= HOUSE_BRAND_ACCEPTANCE_THRESHOLD (${parsed.data.HOUSE_BRAND_ACCEPTANCE_THRESHOLD})`,
    );
  }

  if (parsed.data.OPENAI_RETRY_BASE_MS > parsed.data.OPENAI_RETRY_MAX_MS) {
    throw new Error(
      `Invalid environment configuration: OPENAI_RETRY_BASE_MS (${parsed.data.OPENAI_RETRY_BASE_MS}) must be <= OPENAI_RETRY_MAX_MS (${parsed.data.OPENAI_RETRY_MAX_MS})`,
    );
  }

  if ((parsed.data.RERANK_ENABLED || parsed.data.IMAGE_SIMILARITY_ENABLED) && !parsed.data.OPENAI_API_KEY) {
    throw new Error(
      "Invalid environment configuration: OPENAI_API_KEY is required when RERANK_ENABLED or IMAGE_SIMILARITY_ENABLED is set",
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}
