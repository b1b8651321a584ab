import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { AnalyticsEvent, EventPipeline } from '../../domain/index.js';

export const DEFAULT_STREAM_KEY = 'analytics_events';

/**
 * Flattens an event into the field/value list stored on the stream.
 * Redis Streams require string values, so the full event is JSON-encoded
 * under `event`; the other fields allow filtering without decoding it.
 */
export function encodeStreamFields(event: AnalyticsEvent): string[] {
  return [
    'message_id', event.messageId,
    'type', event.type,
    'anonymous_id', event.anonymousId,
    'timestamp', event.timestamp,
    'event', JSON.stringify(event),
  ];
}

/**
 * Appends an event to the Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`).
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEvent(redis: Redis, streamKey: string, event: AnalyticsEvent): Promise<string | null> {
  return redis.xadd(streamKey, '*', ...encodeStreamFields(event));
}

/**
 * Delivery pipeline that hands each event to a Redis Stream.
 *
 * `process()` is fire-and-forget: it issues the XADD and returns. Commands
 * on one ioredis connection are sent in issue order, so events land on the
 * stream in the order they were processed. Failures are logged, never thrown.
 */
export class RedisStreamPipeline implements EventPipeline {
  private readonly redis: Redis;
  private readonly log: Logger;
  private readonly streamKey: string;
  private readonly inFlight: Set<Promise<void>> = new Set();

  constructor(redis: Redis, log: Logger, streamKey: string = DEFAULT_STREAM_KEY) {
    this.redis = redis;
    this.log = log;
    this.streamKey = streamKey;
  }

  process(event: AnalyticsEvent): void {
    const write = enqueueEvent(this.redis, this.streamKey, event)
      .then((entryId) => {
        this.log.debug({ stream: this.streamKey, entryId, messageId: event.messageId }, 'Event enqueued');
      })
      .catch((err: unknown) => {
        this.log.error({ err, stream: this.streamKey, messageId: event.messageId }, 'Failed to enqueue event');
      })
      .finally(() => {
        this.inFlight.delete(write);
      });

    this.inFlight.add(write);
  }

  /** Resolves when every XADD issued so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  /** Number of writes not yet settled. */
  get pending(): number {
    return this.inFlight.size;
  }
}
