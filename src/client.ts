import { randomUUID } from 'node:crypto';
import { Redis } from 'ioredis';
import pino from 'pino';
import type { Logger } from 'pino';
import type {
  Enrichment,
  EventPipeline,
  IdentityStorage,
  Serializer,
} from './domain/index.js';
import {
  Analytics,
  EventFactory,
  IdentityStore,
  createMonotonicClock,
} from './application/index.js';
import type { ClientConfig, ErrorHandler } from './infrastructure/index.js';
import {
  FileIdentityStorage,
  InMemoryPipeline,
  MemoryIdentityStorage,
  RedisIdentityStorage,
  RedisStreamPipeline,
  createJsonSerializer,
  createLogReporter,
  hydrateIdentity,
  loadClientConfig,
  persistIdentity,
} from './infrastructure/index.js';

export interface AnalyticsOptions {
  /** Overrides applied on top of the environment configuration. */
  readonly config?: Partial<ClientConfig>;
  /** Environment to read configuration from; defaults to `process.env`. */
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
  /** Replaces the pipeline chosen from configuration. */
  readonly pipeline?: EventPipeline;
  /** Replaces the storage chosen from configuration. */
  readonly identityStorage?: IdentityStorage;
  readonly serializer?: Serializer;
  /** Pipeline-wide enrichments, in application order. */
  readonly enrichments?: readonly Enrichment[];
  readonly onError?: ErrorHandler;
  /** Clock in epoch milliseconds. */
  readonly now?: () => number;
  /** Id generator for message ids and anonymous ids. */
  readonly generateId?: () => string;
}

/**
 * Composition root.
 *
 * Order:
 * 1) Configuration + logger
 * 2) Redis connection (only when configured and needed)
 * 3) Identity storage → hydrate → store → persistence
 * 4) Pipeline, serializer, reporter
 * 5) Gateway
 */
export async function createAnalytics(options: AnalyticsOptions = {}): Promise<Analytics> {
  const config: ClientConfig = { ...loadClientConfig(options.env), ...options.config };
  const log = options.logger ?? pino({ level: config.logLevel });
  const generateId = options.generateId ?? randomUUID;

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  const needsRedis = config.redisUrl !== undefined
    && (options.pipeline === undefined || options.identityStorage === undefined);

  let redis: Redis | null = null;
  if (needsRedis && config.redisUrl !== undefined) {
    redis = await connectRedis(config.redisUrl, log);
    log.info({ stream: config.streamKey }, 'Redis connected');
  }

  const storage = options.identityStorage ?? defaultStorage(config, redis, log);

  // --------------------------------------------------
  // Identity
  // --------------------------------------------------

  const initial = await hydrateIdentity(storage, generateId, log);
  const identity = new IdentityStore(initial, log);
  const persistence = persistIdentity(identity, storage, log);

  // --------------------------------------------------
  // Dispatch
  // --------------------------------------------------

  const pipeline = options.pipeline ?? defaultPipeline(config, redis, log);

  const analytics = new Analytics({
    identity,
    pipeline,
    serializer: options.serializer ?? createJsonSerializer(),
    reporter: createLogReporter(log, options.onError),
    events: new EventFactory({
      generateId,
      timestamp: createMonotonicClock(options.now),
    }),
    log,
    generateAnonymousId: generateId,
    enrichments: options.enrichments ?? [],
    onFlush: persistence.flush,
    onShutdown: async () => {
      persistence.stop();
      if (redis !== null) {
        await redis.quit();
        log.info('Redis disconnected');
      }
    },
  });

  log.info({ anonymousId: analytics.anonymousId }, 'Analytics client ready');
  return analytics;
}

/**
 * Opens the Redis connection. A failed first connect tears the client down
 * so ioredis stops retrying, then rethrows.
 */
async function connectRedis(url: string, log: Logger): Promise<Redis> {
  const redis = new Redis(url, {
    enableReadyCheck: true,
    lazyConnect: true,
  });
  redis.on('error', (err: Error) => {
    log.warn({ err }, 'Redis connection error');
  });

  try {
    await redis.connect();
  } catch (err: unknown) {
    redis.disconnect();
    log.error({ err }, 'Redis connection failed');
    throw err;
  }
  return redis;
}

function defaultStorage(config: ClientConfig, redis: Redis | null, log: Logger): IdentityStorage {
  if (redis !== null) return new RedisIdentityStorage(redis, log, config.identityKey);
  if (config.identityFile !== undefined) return new FileIdentityStorage(config.identityFile, log);
  return new MemoryIdentityStorage();
}

function defaultPipeline(config: ClientConfig, redis: Redis | null, log: Logger): EventPipeline {
  if (redis !== null) return new RedisStreamPipeline(redis, log, config.streamKey);
  log.warn('No delivery transport configured, events are buffered in memory');
  return new InMemoryPipeline(config.maxBufferedEvents, log);
}
