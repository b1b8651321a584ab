import { z } from 'zod';
import { ConfigurationError } from '../domain/index.js';
import { DEFAULT_MAX_EVENTS } from './pipeline/index.js';
import { DEFAULT_IDENTITY_KEY, DEFAULT_STREAM_KEY } from './redis/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Resolved client configuration. */
export interface ClientConfig {
  readonly logLevel: LogLevel;
  /** Enables the Redis stream pipeline and Redis identity storage. */
  readonly redisUrl?: string;
  readonly streamKey: string;
  readonly identityKey: string;
  /** JSON file for the identity record, used when Redis is not configured. */
  readonly identityFile?: string;
  readonly maxBufferedEvents: number;
}

/**
 * Zod schema for the environment variables the client reads.
 * Empty strings count as unset.
 */
const envSchema = z.object({
  ANALYTICS_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ANALYTICS_REDIS_URL: z.string().url().optional(),
  ANALYTICS_STREAM_KEY: z.string().min(1).default(DEFAULT_STREAM_KEY),
  ANALYTICS_IDENTITY_KEY: z.string().min(1).default(DEFAULT_IDENTITY_KEY),
  ANALYTICS_IDENTITY_FILE: z.string().min(1).optional(),
  ANALYTICS_MAX_BUFFERED_EVENTS: z.coerce.number().int().min(1).default(DEFAULT_MAX_EVENTS),
});

const ENV_KEYS = Object.keys(envSchema.shape);

/**
 * Reads client configuration from environment variables.
 *
 * Missing variables fall back to defaults. Invalid values throw
 * `ConfigurationError` listing every offending variable.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid analytics configuration (${details})`);
  }

  const data = parsed.data;
  return {
    logLevel: data.ANALYTICS_LOG_LEVEL,
    streamKey: data.ANALYTICS_STREAM_KEY,
    identityKey: data.ANALYTICS_IDENTITY_KEY,
    maxBufferedEvents: data.ANALYTICS_MAX_BUFFERED_EVENTS,
    ...(data.ANALYTICS_REDIS_URL !== undefined ? { redisUrl: data.ANALYTICS_REDIS_URL } : {}),
    ...(data.ANALYTICS_IDENTITY_FILE !== undefined ? { identityFile: data.ANALYTICS_IDENTITY_FILE } : {}),
  };
}
