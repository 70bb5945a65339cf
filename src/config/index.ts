/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables. Parsed lazily on
 * first access so tests can stub the environment before anything reads it.
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

/**
 * Optional URL string that treats empty/undefined as undefined
 */
const optionalUrl = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") {
      return undefined;
    }
    try {
      new URL(val);
      return val;
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid url`,
      });
      return z.NEVER;
    }
  });

/**
 * Comma-separated list, trimmed, empty entries removed
 */
const csvList = z
  .string()
  .transform((val) => val.split(",").map((k) => k.trim()).filter((k) => k.length > 0));

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3100),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    allowedOrigins: csvList.optional(),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),

  auth: z.object({
    supportApiKeys: csvList.optional(),
  }),

  rateLimits: z.object({
    defaultRpm: z.coerce.number().int().positive().default(120),
  }),

  workflow: z.object({
    configPath: z.string().default("config/workflow.yaml"),
    commonProviderUrl: optionalUrl,
    atlasProviderUrl: optionalUrl,
  }),

  llm: z.object({
    openaiApiKey: z.string().optional(),
    model: z.string().default("gpt-4o-mini"),
  }),

  providers: z.object({
    port: z.coerce.number().int().positive().optional(),
    useInMemoryStore: booleanString.default(false),
    seedPath: z.string().default("data/knowledge-base.json"),
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
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      allowedOrigins: env.ALLOWED_ORIGINS,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
    },
    auth: {
      supportApiKeys: env.SUPPORT_API_KEYS,
    },
    rateLimits: {
      defaultRpm: env.RATE_LIMIT_RPM,
    },
    workflow: {
      configPath: env.WORKFLOW_CONFIG_PATH,
      commonProviderUrl: env.COMMON_PROVIDER_URL,
      atlasProviderUrl: env.ATLAS_PROVIDER_URL,
    },
    llm: {
      openaiApiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
    },
    providers: {
      port: env.PROVIDER_PORT,
      useInMemoryStore: env.PROVIDER_IN_MEMORY_STORE,
      seedPath: env.PROVIDER_SEED_PATH,
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

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access. This allows tests
 * to set environment variables before the config is parsed.
 *
 * ```
 * import { config } from './config/index.js';
 * const port = config.server.port;
 * ```
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
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

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}
