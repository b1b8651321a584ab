import { describe, it, expect, vi } from 'vitest';
import { IdentityStore } from '../../src/application/identity-store.js';
import type { IdentityState } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

describe('IdentityStore', () => {
  it('initialises at version 0 with the given state', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    expect(store.get()).toEqual({ version: 0, state: { anonymousId: 'anon-1' } });
  });

  it('dispatch() bumps the version and returns the new snapshot', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const snapshot = store.dispatch({ kind: 'setUserId', userId: 'u1' });

    expect(snapshot).toBe(store.get());
    expect(snapshot.version).toBe(1);
    expect(store.state).toEqual({ anonymousId: 'anon-1', userId: 'u1' });
  });

  it('get() returns the same reference until the next dispatch', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const first = store.get();
    expect(store.get()).toBe(first);

    store.dispatch({ kind: 'setUserId', userId: 'u1' });
    expect(store.get()).not.toBe(first);
  });

  it('snapshots are frozen and never modified by later dispatches', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    store.dispatch({ kind: 'setTraits', traits: { a: 1 } });
    const held = store.get();

    store.dispatch({ kind: 'setTraits', traits: { b: 2 } });

    expect(Object.isFrozen(held)).toBe(true);
    expect(Object.isFrozen(held.state)).toBe(true);
    expect(held.state.traits).toEqual({ a: 1 });
    expect(store.state.traits).toEqual({ b: 2 });
  });

  it('listeners observe user id and traits written together', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const seen: IdentityState[] = [];
    store.subscribe(() => seen.push(store.state));

    store.dispatch({ kind: 'setUserIdAndTraits', userId: 'u1', traits: { a: 1 } });

    expect(seen).toEqual([{ anonymousId: 'anon-1', userId: 'u1', traits: { a: 1 } }]);
  });

  it('passes the action to listeners', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const listener = vi.fn();
    store.subscribe(listener);

    store.dispatch({ kind: 'reset', anonymousId: 'anon-2' });

    expect(listener).toHaveBeenCalledWith(
      { version: 1, state: { anonymousId: 'anon-2' } },
      { kind: 'reset', anonymousId: 'anon-2' },
    );
  });

  it('unsubscribe stops notifications', () => {
    const store = new IdentityStore({ anonymousId: 'anon-1' }, fakeLogger());
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    unsubscribe();
    store.dispatch({ kind: 'setUserId', userId: 'u1' });

    expect(listener).not.toHaveBeenCalled();
  });

  it('a throwing listener is logged and does not stop the others', () => {
    const log = fakeLogger();
    const store = new IdentityStore({ anonymousId: 'anon-1' }, log);
    const error = new Error('listener broke');
    const after = vi.fn();
    store.subscribe(() => {
      throw error;
    });
    store.subscribe(after);

    store.dispatch({ kind: 'setUserId', userId: 'u1' });

    expect(after).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith({ err: error, action: 'setUserId' }, 'Identity listener failed');
    expect(store.state.userId).toBe('u1');
  });
});
