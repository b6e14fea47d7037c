import { z } from "zod";

export class ConfigError extends Error {
  public issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";
const DEFAULT_MODEL = "deepseek/deepseek-chat-v3-0324";
const DEV_API_KEY = "dummy-key-for-dev";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: positiveInt(3000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  EXTRACTION_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  EXTRACTION_MAX_TOKENS: positiveInt(3000),
  EXTRACTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  EXTRACTION_MAX_ATTEMPTS: positiveInt(3),
  EXTRACTION_BATCH_SIZE: positiveInt(5),
  EXTRACTION_MAX_WORKERS: positiveInt(4),
  EXTRACTION_REQUEST_TIMEOUT_MS: positiveInt(60_000),
  EXTRACTION_CHUNK_TIMEOUT_MS: positiveInt(180_000),
  EXTRACTION_INTER_CHUNK_DELAY_MS: nonNegativeInt(250),
  EXTRACTION_MAX_CHARS_PER_RESUME: positiveInt(15_000),
  EXTRACTION_MIN_PHONE_DIGITS: positiveInt(8),
  EXTRACTION_RATE_LIMIT_BASE_MS: nonNegativeInt(5_000),
  EXTRACTION_RATE_LIMIT_STEP_MS: nonNegativeInt(5_000),
  EXTRACTION_RATE_LIMIT_MAX_WAIT_MS: positiveInt(60_000),
  EXTRACTION_TIMEOUT_BASE_MS: nonNegativeInt(2_000),
  EXTRACTION_BACKOFF_UNIT_MS: nonNegativeInt(1_000),
  SIMULATE_RATE_LIMIT: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

export type BackoffSettings = {
  rateLimitBaseMs: number;
  rateLimitStepMs: number;
  rateLimitMaxWaitMs: number;
  timeoutBaseMs: number;
  unitMs: number;
};

export type PipelineConfig = {
  apiKey: string;
  baseURL: string;
  model: string;
  maxTokens: number;
  temperature: number;
  maxAttempts: number;
  batchSize: number;
  maxWorkers: number;
  requestTimeoutMs: number;
  chunkTimeoutMs: number;
  interChunkDelayMs: number;
  maxCharsPerResume: number;
  minPhoneDigits: number;
  backoff: BackoffSettings;
  simulateRateLimit: boolean;
};

export type ServerConfig = {
  port: number;
  nodeEnv: string;
  pipeline: PipelineConfig;
};

export const DEFAULT_BACKOFF: BackoffSettings = {
  rateLimitBaseMs: 5_000,
  rateLimitStepMs: 5_000,
  rateLimitMaxWaitMs: 60_000,
  timeoutBaseMs: 2_000,
  unitMs: 1_000,
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  apiKey: DEV_API_KEY,
  baseURL: DEFAULT_BASE_URL,
  model: DEFAULT_MODEL,
  maxTokens: 3000,
  temperature: 0.1,
  maxAttempts: 3,
  batchSize: 5,
  maxWorkers: 4,
  requestTimeoutMs: 60_000,
  chunkTimeoutMs: 180_000,
  interChunkDelayMs: 250,
  maxCharsPerResume: 15_000,
  minPhoneDigits: 8,
  backoff: DEFAULT_BACKOFF,
  simulateRateLimit: false,
};

/**
 * Merge partial overrides onto the defaults (used by tests and embedders)
 */
export function buildPipelineConfig(
  overrides: Partial<Omit<PipelineConfig, "backoff">> & { backoff?: Partial<BackoffSettings> } = {}
): PipelineConfig {
  return {
    ...DEFAULT_PIPELINE_CONFIG,
    ...overrides,
    backoff: { ...DEFAULT_BACKOFF, ...overrides.backoff },
  };
}

/**
 * Validate an environment record into the server configuration
 * @throws ConfigError when a variable is malformed or the API key is missing in production
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join("; ")}`, issues);
  }

  const vars = parsed.data;
  const apiKey = vars.OPENAI_API_KEY?.trim();

  if (!apiKey && vars.NODE_ENV === "production") {
    throw new ConfigError("OPENAI_API_KEY is required in production");
  }

  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    pipeline: {
      apiKey: apiKey || DEV_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
      model: vars.EXTRACTION_MODEL,
      maxTokens: vars.EXTRACTION_MAX_TOKENS,
      temperature: vars.EXTRACTION_TEMPERATURE,
      maxAttempts: vars.EXTRACTION_MAX_ATTEMPTS,
      batchSize: vars.EXTRACTION_BATCH_SIZE,
      maxWorkers: vars.EXTRACTION_MAX_WORKERS,
      requestTimeoutMs: vars.EXTRACTION_REQUEST_TIMEOUT_MS,
      chunkTimeoutMs: vars.EXTRACTION_CHUNK_TIMEOUT_MS,
      interChunkDelayMs: vars.EXTRACTION_INTER_CHUNK_DELAY_MS,
      maxCharsPerResume: vars.EXTRACTION_MAX_CHARS_PER_RESUME,
      minPhoneDigits: vars.EXTRACTION_MIN_PHONE_DIGITS,
      backoff: {
        rateLimitBaseMs: vars.EXTRACTION_RATE_LIMIT_BASE_MS,
        rateLimitStepMs: vars.EXTRACTION_RATE_LIMIT_STEP_MS,
        rateLimitMaxWaitMs: vars.EXTRACTION_RATE_LIMIT_MAX_WAIT_MS,
        timeoutBaseMs: vars.EXTRACTION_TIMEOUT_BASE_MS,
        unitMs: vars.EXTRACTION_BACKOFF_UNIT_MS,
      },
      simulateRateLimit: vars.SIMULATE_RATE_LIMIT,
    },
  };
}
