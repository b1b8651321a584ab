import { describe, it, expect, vi } from 'vitest';
import { IdentityStore } from '../../src/application/identity-store.js';
import type { IdentityState, IdentityStorage } from '../../src/domain/index.js';
import { MemoryIdentityStorage } from '../../src/infrastructure/identity/memory-storage.js';
import { hydrateIdentity, persistIdentity } from '../../src/infrastructure/identity/persistence.js';
import { fakeLogger } from '../helpers.js';

/** Storage double that records every saved state. */
function recordingStorage(initial: IdentityState | null = null) {
  const saved: IdentityState[] = [];
  const storage = {
    load: vi.fn(async () => initial),
    save: vi.fn(async (state: IdentityState) => {
      saved.push(state);
    }),
  } satisfies IdentityStorage;
  return { storage, saved };
}

describe('hydrateIdentity', () => {
  it('returns the persisted identity when present', async () => {
    const log = fakeLogger();
    const { storage, saved } = recordingStorage({ anonymousId: 'anon-1', userId: 'u1' });
    const generateId = vi.fn(() => 'anon-new');

    expect(await hydrateIdentity(storage, generateId, log)).toEqual({ anonymousId: 'anon-1', userId: 'u1' });
    expect(generateId).not.toHaveBeenCalled();
    expect(saved).toEqual([]);
    expect(log.info).toHaveBeenCalledWith({ anonymousId: 'anon-1', hasUserId: true }, 'Identity restored');
  });

  it('creates and saves a fresh anonymous identity on first run', async () => {
    const storage = new MemoryIdentityStorage();

    expect(await hydrateIdentity(storage, () => 'anon-new', fakeLogger())).toEqual({ anonymousId: 'anon-new' });
    expect(await storage.load()).toEqual({ anonymousId: 'anon-new' });
  });

  it('starts fresh when loading fails', async () => {
    const log = fakeLogger();
    const error = new Error('disk unreadable');
    const { storage } = recordingStorage();
    storage.load.mockRejectedValueOnce(error);

    expect(await hydrateIdentity(storage, () => 'anon-new', log)).toEqual({ anonymousId: 'anon-new' });
    expect(log.warn).toHaveBeenCalledWith({ err: error }, 'Failed to load persisted identity, starting fresh');
  });

  it('still returns the fresh identity when saving it fails', async () => {
    const log = fakeLogger();
    const error = new Error('read-only');
    const { storage } = recordingStorage();
    storage.save.mockRejectedValueOnce(error);

    expect(await hydrateIdentity(storage, () => 'anon-new', log)).toEqual({ anonymousId: 'anon-new' });
    expect(log.warn).toHaveBeenCalledWith({ err: error }, 'Failed to persist new identity');
  });
});

describe('persistIdentity', () => {
  it('saves every change in version order', async () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const { storage, saved } = recordingStorage();
    const persistence = persistIdentity(store, storage, fakeLogger());

    store.dispatch({ kind: 'setUserId', userId: 'u1' });
    store.dispatch({ kind: 'setTraits', traits: { a: 1 } });
    await persistence.flush();

    expect(saved).toEqual([
      { anonymousId: 'anon-1', userId: 'u1' },
      { anonymousId: 'anon-1', userId: 'u1', traits: { a: 1 } },
    ]);
  });

  it('logs a failed write and keeps saving later changes', async () => {
    const log = fakeLogger();
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const { storage, saved } = recordingStorage();
    const error = new Error('write failed');
    storage.save.mockRejectedValueOnce(error);
    const persistence = persistIdentity(store, storage, log);

    store.dispatch({ kind: 'setUserId', userId: 'u1' });
    store.dispatch({ kind: 'setUserId', userId: 'u2' });
    await persistence.flush();

    expect(log.warn).toHaveBeenCalledWith({ err: error, version: 1 }, 'Failed to persist identity');
    expect(saved).toEqual([{ anonymousId: 'anon-1', userId: 'u2' }]);
  });

  it('stop() ends mirroring', async () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const { storage, saved } = recordingStorage();
    const persistence = persistIdentity(store, storage, fakeLogger());

    persistence.stop();
    store.dispatch({ kind: 'setUserId', userId: 'u1' });
    await persistence.flush();

    expect(saved).toEqual([]);
  });
});
