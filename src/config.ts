// =============================================================================
// Configuration — environment-driven logging settings
// =============================================================================
// Cache behaviour is configured per instance (capacity, options, per-call
// TTL). The environment only controls how the library logs.
//
// Importing this module reads `process.env` as the host left it. A `.env`
// file is loaded only when the host calls `loadConfig()` without arguments.
// =============================================================================
import dotenv from 'dotenv';
import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  /** Optional log file; when unset only the console transport is used */
  logFile: string | undefined;
}

const DEFAULTS: AppConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logFile: undefined,
};

const EnvSchema = z.object({
  NODE_ENV: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_FILE: z.string().min(1).optional(),
});

/**
 * Build the configuration from an environment map. With no argument, `.env`
 * is loaded into `process.env` first and `process.env` is used.
 *
 * Each invalid variable falls back to its default and is reported once on
 * the console (the logger is not available yet at this point).
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AppConfig {
  if (!env) {
    dotenv.config();
    return parseEnv(process.env);
  }
  return parseEnv(env);
}

function parseEnv(env: NodeJS.ProcessEnv): AppConfig {
  const raw = {
    NODE_ENV: env.NODE_ENV || undefined,
    LOG_LEVEL: env.LOG_LEVEL?.toLowerCase() || undefined,
    LOG_FILE: env.LOG_FILE || undefined,
  };

  const parsed = EnvSchema.safeParse(raw);
  if (parsed.success) {
    return {
      nodeEnv: parsed.data.NODE_ENV ?? DEFAULTS.nodeEnv,
      logLevel: parsed.data.LOG_LEVEL ?? DEFAULTS.logLevel,
      logFile: parsed.data.LOG_FILE ?? DEFAULTS.logFile,
    };
  }

  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  for (const key of invalid) {
    console.warn(`⚠️  Invalid config: ${key}, using default`);
  }

  return {
    nodeEnv: invalid.has('NODE_ENV') ? DEFAULTS.nodeEnv : raw.NODE_ENV ?? DEFAULTS.nodeEnv,
    logLevel: invalid.has('LOG_LEVEL') ? DEFAULTS.logLevel : parseLevel(raw.LOG_LEVEL),
    logFile: invalid.has('LOG_FILE') ? DEFAULTS.logFile : raw.LOG_FILE,
  };
}

function parseLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? DEFAULTS.logLevel;
}

const config: AppConfig = loadConfig(process.env);

export default config;
