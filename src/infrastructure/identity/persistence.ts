import type { Logger } from 'pino';
import type { IdentityState, IdentityStorage } from '../../domain/index.js';
import type { IdentityStore } from '../../application/identity-store.js';

/**
 * Loads the persisted identity, or creates a fresh anonymous one and saves it.
 *
 * A failed load is logged and treated like a first run, so the client always
 * starts with a usable identity.
 */
export async function hydrateIdentity(
  storage: IdentityStorage,
  generateId: () => string,
  log: Logger,
): Promise<IdentityState> {
  try {
    const existing = await storage.load();
    if (existing !== null) {
      log.info({ anonymousId: existing.anonymousId, hasUserId: existing.userId !== undefined }, 'Identity restored');
      return existing;
    }
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to load persisted identity, starting fresh');
  }

  const fresh: IdentityState = { anonymousId: generateId() };
  try {
    await storage.save(fresh);
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to persist new identity');
  }
  log.info({ anonymousId: fresh.anonymousId }, 'New anonymous identity created');
  return fresh;
}

export interface IdentityPersistence {
  /** Resolves once every write queued so far has settled. */
  flush(): Promise<void>;
  /** Stops listening for changes. Queued writes still complete. */
  stop(): void;
}

/**
 * Mirrors every identity snapshot into `storage`.
 *
 * Writes are chained so they land in version order. Best-effort: a failed
 * write is logged and the chain continues with the next snapshot.
 */
export function persistIdentity(
  store: IdentityStore,
  storage: IdentityStorage,
  log: Logger,
): IdentityPersistence {
  let chain: Promise<void> = Promise.resolve();

  const unsubscribe = store.subscribe((snapshot) => {
    chain = chain
      .then(() => storage.save(snapshot.state))
      .catch((err: unknown) => {
        log.warn({ err, version: snapshot.version }, 'Failed to persist identity');
      });
  });

  return {
    flush: () => chain,
    stop: unsubscribe,
  };
}
