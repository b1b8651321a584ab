import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { IdentityState, IdentityStorage } from '../../domain/index.js';
import { parseIdentityState } from '../../application/event-schema.js';

export const DEFAULT_IDENTITY_KEY = 'analytics:identity';

/**
 * Stores the identity record as a JSON string under a single Redis key.
 *
 * Malformed content is logged and loads as `null`, which makes the client
 * start a fresh anonymous identity.
 */
export class RedisIdentityStorage implements IdentityStorage {
  private readonly redis: Redis;
  private readonly log: Logger;
  private readonly key: string;

  constructor(redis: Redis, log: Logger, key: string = DEFAULT_IDENTITY_KEY) {
    this.redis = redis;
    this.log = log;
    this.key = key;
  }

  async load(): Promise<IdentityState | null> {
    const content = await this.redis.get(this.key);
    if (content === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err: unknown) {
      this.log.warn({ err, key: this.key }, 'Persisted identity is not valid JSON');
      return null;
    }

    const state = parseIdentityState(raw);
    if (state === null) {
      this.log.warn({ key: this.key }, 'Persisted identity does not match the expected shape');
    }
    return state;
  }

  async save(state: IdentityState): Promise<void> {
    await this.redis.set(this.key, JSON.stringify(state));
  }
}
