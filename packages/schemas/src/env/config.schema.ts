import { z } from 'zod';
import { PING_INTERVAL_MS, PING_TIMEOUT_MS, STATS_INTERVAL_MS } from '../stream/stats.schema';

const positiveIntFromString = z
  .string()
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().int().positive());

const booleanFromString = z
  .enum(['true', 'false'])
  .transform((val) => val === 'true');

/**
 * Environment configuration schema
 * Validates all streaming server environment variables on startup
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Stream server bind address
  STREAM_HOST: z.string().min(1).default('localhost'),
  STREAM_PORT: positiveIntFromString.default('8083'),
  STREAM_PATH: z.string().startsWith('/', 'STREAM_PATH must start with "/"').default('/'),

  // Timers
  STREAM_STATS_INTERVAL_MS: positiveIntFromString.default(String(STATS_INTERVAL_MS)),
  STREAM_PING_INTERVAL_MS: positiveIntFromString.default(String(PING_INTERVAL_MS)),
  STREAM_PING_TIMEOUT_MS: positiveIntFromString.default(String(PING_TIMEOUT_MS)),

  // Protocol behaviour
  STREAM_REJECT_UNKNOWN_TYPES: booleanFromString.default('false'),
  STREAM_MAX_CUSTOM_SOURCES: positiveIntFromString.default('50'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
