/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to the environment variables the priming
 * service reads. Parsed lazily on first access so tests can stub the
 * environment before anything is read.
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
 * Comma separated list, empty entries dropped
 */
const commaList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * Locale identifiers are compared by exact match; only surrounding
 * whitespace is stripped.
 */
const Locale = z.string().trim().min(1);

const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    allowedOrigins: commaList.default("http://localhost:3000"),
  }),

  priming: z.object({
    defaultLocale: Locale.default("en-us"),
    memoizeDescriptions: booleanString.default(true),
    maxReplayEvents: z.coerce.number().int().positive().default(200),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    priming: {
      defaultLocale: env.PRIMING_DEFAULT_LOCALE,
      memoizeDescriptions: env.PRIMING_MEMOIZE,
      maxReplayEvents: env.PRIMING_MAX_REPLAY_EVENTS,
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
 * Defers parsing until first property access. The config is parsed once
 * and cached until `_resetConfigCache()` is called.
 *
 * ```
 * import { config } from './config/index.js';
 * const locale = config.priming.defaultLocale;
 * ```
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
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

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
