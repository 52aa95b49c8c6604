/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to every environment variable the service
 * reads. Core alignment components never touch `process.env`; they receive
 * an explicit {@link AlignmentSettings} struct built from this config.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

const LLMProvider = z.enum(["openai", "fixtures"]);

const EmbeddingsProvider = z.enum(["openai", "local"]);

const InsightsMode = z.enum(["rules", "llm"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const unitInterval = z.coerce.number().min(0).max(1);
const percentScale = z.coerce.number().min(0).max(100);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    host: z.string().default("0.0.0.0"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(5 * 1024 * 1024),
    rateLimitRpm: z.coerce.number().int().positive().default(120),
    allowedOrigins: z
      .string()
      .transform((val) => val.split(",").map((o) => o.trim()).filter((o) => o.length > 0))
      .optional(),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: z.string().default("gpt-4o-mini"),
    openaiApiKey: z.string().optional(),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
    proposalTemperature: z.coerce.number().min(0).max(2).default(0.4),
    insightTemperature: z.coerce.number().min(0).max(2).default(0.3),
  }),

  embeddings: z.object({
    provider: EmbeddingsProvider.default("openai"),
    model: z.string().default("text-embedding-3-large"),
    maxChars: z.coerce.number().int().positive().default(8000),
  }),

  alignment: z.object({
    embeddingWeight: unitInterval.default(0.6),
    entityWeight: unitInterval.default(0.4),
    strongSupportThreshold: percentScale.default(75),
    similarityThreshold: unitInterval.default(0.7),
    fuzzyThreshold: percentScale.default(85),
    topK: z.coerce.number().int().positive().default(5),
    perMatchEntityPoints: z.coerce.number().positive().default(20),
    baseImprovement: z.coerce.number().nonnegative().default(12),
    diminishingFactor: unitInterval.default(0.7),
    entityTrackingImprovement: z.coerce.number().nonnegative().default(8),
    weakObjectiveThreshold: percentScale.default(75),
    maxObjectivesForProposals: z.coerce.number().int().nonnegative().default(3),
    entityProposalThreshold: percentScale.default(60),
    insights: InsightsMode.default("rules"),
  }),

  storage: z.object({
    dataDir: z.string().default("data"),
    backupEnabled: booleanString.default(false),
  }),

});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      rateLimitRpm: env.GLOBAL_RATE_LIMIT_RPM,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      openaiApiKey: env.OPENAI_API_KEY,
      timeoutMs: env.LLM_TIMEOUT_MS,
      proposalTemperature: env.LLM_PROPOSAL_TEMPERATURE,
      insightTemperature: env.LLM_INSIGHT_TEMPERATURE,
    },
    embeddings: {
      provider: env.EMBEDDINGS_PROVIDER,
      model: env.EMBEDDINGS_MODEL,
      maxChars: env.EMBEDDINGS_MAX_CHARS,
    },
    alignment: {
      embeddingWeight: env.ALIGNMENT_EMBEDDING_WEIGHT,
      entityWeight: env.ALIGNMENT_ENTITY_WEIGHT,
      strongSupportThreshold: env.ALIGNMENT_STRONG_SUPPORT_THRESHOLD,
      similarityThreshold: env.ALIGNMENT_SIMILARITY_THRESHOLD,
      fuzzyThreshold: env.ALIGNMENT_FUZZY_THRESHOLD,
      topK: env.ALIGNMENT_TOP_K,
      perMatchEntityPoints: env.ALIGNMENT_PER_MATCH_ENTITY_POINTS,
      baseImprovement: env.ALIGNMENT_BASE_IMPROVEMENT,
      diminishingFactor: env.ALIGNMENT_DIMINISHING_FACTOR,
      entityTrackingImprovement: env.ALIGNMENT_ENTITY_TRACKING_IMPROVEMENT,
      weakObjectiveThreshold: env.ALIGNMENT_WEAK_OBJECTIVE_THRESHOLD,
      maxObjectivesForProposals: env.ALIGNMENT_MAX_OBJECTIVES_FOR_PROPOSALS,
      entityProposalThreshold: env.ALIGNMENT_ENTITY_PROPOSAL_THRESHOLD,
      insights: env.ALIGNMENT_INSIGHTS,
    },
    storage: {
      dataDir: env.DATA_DIR,
      backupEnabled: env.STORAGE_BACKUP_ENABLED,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access so tests can stub environment
 * variables before the config is read. Parsed once and cached thereafter.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
