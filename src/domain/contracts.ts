import type { CanonicalMap, CanonicalValue } from './canonical-value.js';
import type { SerializationError } from './errors.js';
import type { AnalyticsEvent } from './event.js';
import type { IdentityState } from './identity.js';

/**
 * Collaborator contracts consumed by the dispatch layer.
 *
 * The gateway depends only on these shapes; infrastructure provides the
 * implementations.
 */

export type SerializeResult =
  | { readonly ok: true; readonly value: CanonicalValue }
  | { readonly ok: false; readonly error: SerializationError };

/** Converts arbitrary values into canonical trees. Must not throw. */
export interface Serializer {
  serialize(value: unknown): SerializeResult;
}

/**
 * Downstream delivery pipeline.
 *
 * `process` must return without waiting on I/O; `flush` resolves once every
 * accepted event has been handed off.
 */
export interface EventPipeline {
  process(event: AnalyticsEvent): void;
  flush(): Promise<void>;
}

/** Error sink. The only user-visible failure channel of the gateway. */
export interface ErrorReporter {
  report(error: Error, fatal: boolean): void;
}

/** Durable home for the identity record across process restarts. */
export interface IdentityStorage {
  load(): Promise<IdentityState | null>;
  save(state: IdentityState): Promise<void>;
}

/** Read-only view of the client handed to every enrichment. */
export interface EnrichmentClient {
  readonly anonymousId: string;
  readonly userId: string | undefined;
  readonly traits: CanonicalMap | undefined;
}

/**
 * Transformation applied to an event before hand-off.
 *
 * Returns an event of the same kind, or `null` to drop it. Must not call back
 * into the gateway.
 */
export type Enrichment = (event: AnalyticsEvent, client: EnrichmentClient) => AnalyticsEvent | null;
