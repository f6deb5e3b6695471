/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Parsing is deferred until the first `getConfig()` call so tests can stub
 * environment variables before the config is read.
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
    if (lower === "false" || lower === "0" || lower === "no" || lower === "") return false;
    return true;
  });

/**
 * Optional secret that treats empty/whitespace strings as absent
 */
const optionalSecret = z
  .union([z.string(), z.undefined()])
  .transform((val) => {
    if (val === undefined) return undefined;
    const trimmed = val.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  });

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  // Server Configuration
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    allowedOrigins: z
      .string()
      .transform((val) =>
        val
          .split(",")
          .map((o) => o.trim())
          .filter((o) => o.length > 0)
      )
      .optional(),
  }),

  // External model (LLM) configuration
  llm: z.object({
    openaiApiKey: optionalSecret,
    model: z.string().default("gpt-4o-mini"),
    baseUrl: optionalSecret,
  }),

  // Feature Flags
  features: z.object({
    // Master switch for external-call mode; a credential is still required
    externalModel: booleanString.default(true),
  }),

  // Critique pipeline
  critique: z.object({
    defaultIntensity: z.coerce.number().int().min(1).max(5).default(3),
    maxTextChars: z.coerce.number().int().positive().default(8000),
    featureVersion: z.string().default("critique-decision-1.0.0"),
  }),

  // Request limits
  limits: z.object({
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    globalRateLimitRpm: z.coerce.number().int().positive().default(120),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    llm: {
      openaiApiKey: env.OPENAI_API_KEY,
      model: env.LLM_MODEL,
      baseUrl: env.OPENAI_BASE_URL,
    },
    features: {
      externalModel: env.EXTERNAL_MODEL_ENABLED,
    },
    critique: {
      defaultIntensity: env.CRITIQUE_DEFAULT_INTENSITY,
      maxTextChars: env.CRITIQUE_MAX_TEXT_CHARS,
      featureVersion: env.CRITIQUE_FEATURE_VERSION,
    },
    limits: {
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      globalRateLimitRpm: env.GLOBAL_RATE_LIMIT_RPM,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing it on first access and caching thereafter.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * Forces a fresh parse on next access so tests can change
 * environment variables between cases.
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Check if running in production environment
 */
export function isProduction(): boolean {
  return getConfig().server.nodeEnv === "production";
}

/**
 * Whether external-call mode can be offered at all: the feature switch is on
 * and a credential is configured.
 */
export function isExternalModelAvailable(cfg: Config = getConfig()): boolean {
  return cfg.features.externalModel && cfg.llm.openaiApiKey !== undefined;
}
