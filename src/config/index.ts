import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenv.config();

// Helper to get __dirname in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Resolve project root assuming config is in src/config
const projectRoot = path.resolve(__dirname, '..', '..');

export interface AppConfig {
  rulesetConfigPath: string;
  tempDir: string;
  cacheDir: string;
  cacheTtlHours: number;
  cacheEvictHours: number;
  maxConcurrent: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  progressIntervalMs: number;
  userAgent: string;
}

const envSchema = z.object({
  RULESET_CONFIG_PATH: z.string().min(1).optional(),
  TEMP_DIR: z.string().min(1).optional(),
  CACHE_DIR: z.string().min(1).optional(),
  CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
  CACHE_EVICT_HOURS: z.coerce.number().positive().default(48),
  MAX_CONCURRENT: z.coerce.number().int().min(1).max(64).default(5),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  PROGRESS_INTERVAL_MS: z.coerce.number().int().min(0).default(500),
  USER_AGENT: z.string().min(1).default('ruleset-forge/1.0'),
});

/**
 * Builds the application settings from environment variables. Relative
 * directories resolve against the project root.
 */
export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  root: string = projectRoot
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment settings: ${details}`);
  }

  const values = parsed.data;
  const tempDir = path.resolve(root, values.TEMP_DIR ?? 'temp');

  return {
    rulesetConfigPath: path.resolve(
      root,
      values.RULESET_CONFIG_PATH ?? 'config.json'
    ),
    tempDir,
    cacheDir: values.CACHE_DIR
      ? path.resolve(root, values.CACHE_DIR)
      : path.join(tempDir, 'cache'),
    cacheTtlHours: values.CACHE_TTL_HOURS,
    cacheEvictHours: values.CACHE_EVICT_HOURS,
    maxConcurrent: values.MAX_CONCURRENT,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    maxRetries: values.MAX_RETRIES,
    retryDelayMs: values.RETRY_DELAY_MS,
    progressIntervalMs: values.PROGRESS_INTERVAL_MS,
    userAgent: values.USER_AGENT,
  };
}
