import type { Logger } from 'pino';
import type { IdentityAction, IdentitySnapshot, IdentityState } from '../domain/index.js';
import { freezeCanonical, reduceIdentity } from '../domain/index.js';

export type IdentityListener = (snapshot: IdentitySnapshot, action: IdentityAction) => void;

function freezeState(state: IdentityState): IdentityState {
  if (state.traits !== undefined) freezeCanonical(state.traits);
  return Object.freeze({ ...state });
}

/**
 * Single authoritative holder of the identity record.
 *
 * Every action replaces the snapshot with a new frozen one in a single
 * synchronous assignment. Because Node.js is single-threaded and
 * `dispatch()` never yields, readers always see either the complete
 * pre-action or the complete post-action record, never a partial mix.
 *
 * Listeners run after the swap and outside of it, so a listener that
 * dispatches again sees the already-updated snapshot.
 */
export class IdentityStore {
  private snapshot: IdentitySnapshot;
  private readonly listeners: Set<IdentityListener> = new Set();
  private readonly log: Logger;

  constructor(initial: IdentityState, log: Logger) {
    this.snapshot = Object.freeze({ version: 0, state: freezeState(initial) });
    this.log = log;
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): IdentitySnapshot {
    return this.snapshot;
  }

  get state(): IdentityState {
    return this.snapshot.state;
  }

  /** Applies an action atomically and returns the new snapshot. */
  dispatch(action: IdentityAction): IdentitySnapshot {
    const next: IdentitySnapshot = Object.freeze({
      version: this.snapshot.version + 1,
      state: freezeState(reduceIdentity(this.snapshot.state, action)),
    });
    this.snapshot = next;

    for (const listener of this.listeners) {
      try {
        listener(next, action);
      } catch (err: unknown) {
        this.log.warn({ err, action: action.kind }, 'Identity listener failed');
      }
    }

    return next;
  }

  /** Registers a change listener; returns a function that removes it. */
  subscribe(listener: IdentityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
