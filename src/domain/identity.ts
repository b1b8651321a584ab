import type { CanonicalMap } from './canonical-value.js';

/** Shared identity record read by every event envelope. */
export interface IdentityState {
  /** Never empty. */
  readonly anonymousId: string;
  readonly userId?: string;
  readonly traits?: CanonicalMap;
}

/** Versioned snapshot held by the identity store. */
export interface IdentitySnapshot {
  readonly version: number;
  readonly state: IdentityState;
}

/**
 * Discrete mutations of the identity record.
 *
 * `setTraits` replaces the trait set wholesale. `setUserIdAndTraits` only
 * touches traits when they are supplied.
 */
export type IdentityAction =
  | { readonly kind: 'setUserId'; readonly userId: string }
  | { readonly kind: 'setTraits'; readonly traits: CanonicalMap }
  | { readonly kind: 'setUserIdAndTraits'; readonly userId: string; readonly traits?: CanonicalMap }
  | { readonly kind: 'reset'; readonly anonymousId: string };

/** Pure reducer. Never fails; inputs are validated before an action is built. */
export function reduceIdentity(state: IdentityState, action: IdentityAction): IdentityState {
  switch (action.kind) {
    case 'setUserId':
      return { ...state, userId: action.userId };
    case 'setTraits':
      return { ...state, traits: action.traits };
    case 'setUserIdAndTraits':
      return action.traits === undefined
        ? { ...state, userId: action.userId }
        : { ...state, userId: action.userId, traits: action.traits };
    case 'reset':
      return { anonymousId: action.anonymousId };
  }
}
