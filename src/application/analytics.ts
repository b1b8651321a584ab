import type { Logger } from 'pino';
import type {
  AnalyticsEvent,
  CanonicalMap,
  Enrichment,
  EnrichmentClient,
  ErrorReporter,
  EventPipeline,
  Serializer,
} from '../domain/index.js';
import {
  ReentrantDispatchError,
  SerializationError,
  isCanonicalMap,
  toError,
} from '../domain/index.js';
import type { ChainResult } from './enrichment-chain.js';
import { EnrichmentRegistry, applyEnrichments } from './enrichment-chain.js';
import type { EventFactory } from './event-builder.js';
import { withPayload } from './event-builder.js';
import { formatIssuePath, requireIdentifier } from './event-schema.js';
import type { IdentityStore } from './identity-store.js';
import { TypedPayload } from './typed-payload.js';

/** Loosely-typed key/value payload. */
export interface UntypedPayload {
  readonly [key: string]: unknown;
}

/**
 * Anything a gateway method accepts as properties or traits.
 * `null` and `undefined` both mean "no payload".
 */
export type Payload = TypedPayload<unknown> | UntypedPayload | null | undefined;

export interface DispatchOptions {
  /** Applied after the pipeline-wide enrichments, for this call only. */
  readonly enrichments?: readonly Enrichment[];
  /** Caller-supplied message id; generated when omitted. */
  readonly messageId?: string;
}

export interface AnalyticsDeps {
  readonly identity: IdentityStore;
  readonly pipeline: EventPipeline;
  readonly serializer: Serializer;
  readonly reporter: ErrorReporter;
  readonly events: EventFactory;
  readonly log: Logger;
  readonly generateAnonymousId: () => string;
  readonly enrichments?: readonly Enrichment[];
  /** Awaited by `flush()` after the pipeline has flushed. */
  readonly onFlush?: () => Promise<void>;
  /** Awaited by `shutdown()` after the final flush. */
  readonly onShutdown?: () => Promise<void>;
}

type PayloadResolution =
  | { readonly ok: true; readonly value: CanonicalMap | undefined }
  | { readonly ok: false };

type MapResult =
  | { readonly ok: true; readonly value: CanonicalMap }
  | { readonly ok: false; readonly error: SerializationError };

function isDispatchOptions(value: unknown): value is DispatchOptions {
  return typeof value === 'object' && value !== null;
}

/**
 * Dispatch gateway, the public entry surface of the client.
 *
 * Each method normalizes its arguments, builds one canonical event, runs the
 * enrichment chain and hands the result to the pipeline. Nothing is returned
 * and nothing is thrown to the caller; failures go to the error reporter:
 *
 * - typed payload fails to serialize → reported fatal, event not sent
 * - untyped payload fails to serialize → reported non-fatal, event sent
 *   without payload
 * - empty identifier → `InvalidEventError` reported fatal, event not sent
 *
 * The one exception is `ReentrantDispatchError`, thrown when an enrichment
 * calls back into the gateway.
 */
export class Analytics implements EnrichmentClient {
  private readonly deps: AnalyticsDeps;
  private readonly registry: EnrichmentRegistry;
  private enriching = false;

  constructor(deps: AnalyticsDeps) {
    this.deps = deps;
    this.registry = new EnrichmentRegistry(deps.enrichments);
  }

  get anonymousId(): string {
    return this.deps.identity.state.anonymousId;
  }

  get userId(): string | undefined {
    return this.deps.identity.state.userId;
  }

  get traits(): CanonicalMap | undefined {
    return this.deps.identity.state.traits;
  }

  /** Registers a pipeline-wide enrichment, applied in registration order. */
  addEnrichment(enrichment: Enrichment): { remove(): void } {
    return this.registry.add(enrichment);
  }

  track(name: string, properties?: Payload, options?: DispatchOptions): void {
    this.emit('track', options, () => {
      const event = this.deps.events.track(this.deps.identity.state, {
        event: name,
        messageId: options?.messageId,
      });
      const payload = this.resolvePayload(properties, 'properties');
      return payload.ok ? withPayload(event, payload.value) : null;
    });
  }

  /**
   * `identify(userId)` sets the user id only, `identify(userId, traits)`
   * sets both, `identify(traits)` replaces the traits only. The identity
   * store is updated before the event is built, so the event reflects the
   * new state.
   */
  identify(userId: string, traits?: Payload, options?: DispatchOptions): void;
  identify(traits: TypedPayload<unknown> | UntypedPayload, options?: DispatchOptions): void;
  identify(
    first: string | TypedPayload<unknown> | UntypedPayload,
    second?: unknown,
    third?: DispatchOptions,
  ): void {
    if (typeof first !== 'string') {
      this.identifyTraits(first, isDispatchOptions(second) ? second : undefined);
    } else if (second === undefined || second === null) {
      this.identifyUser(first, third);
    } else {
      this.identifyUserWithTraits(first, second, third);
    }
  }

  screen(
    title: string,
    category?: string | null,
    properties?: Payload,
    options?: DispatchOptions,
  ): void {
    this.emit('screen', options, () => {
      const event = this.deps.events.screen(this.deps.identity.state, {
        title,
        category,
        messageId: options?.messageId,
      });
      const payload = this.resolvePayload(properties, 'properties');
      return payload.ok ? withPayload(event, payload.value) : null;
    });
  }

  group(groupId: string, traits?: Payload, options?: DispatchOptions): void {
    this.emit('group', options, () => {
      const event = this.deps.events.group(this.deps.identity.state, {
        groupId,
        messageId: options?.messageId,
      });
      const payload = this.resolvePayload(traits, 'traits');
      return payload.ok ? withPayload(event, payload.value) : null;
    });
  }

  /**
   * Replaces the current user id with `newId`. The emitted event carries the
   * id being replaced as `previousId` (the anonymous id when no user id was
   * set).
   */
  alias(newId: string, options?: DispatchOptions): void {
    this.emit('alias', options, () => {
      const id = requireIdentifier('newId', newId);
      const before = this.deps.identity.state;
      const previousId = before.userId ?? before.anonymousId;

      this.deps.identity.dispatch({ kind: 'setUserId', userId: id });

      return this.deps.events.alias(this.deps.identity.state, {
        newId: id,
        previousId,
        messageId: options?.messageId,
      });
    });
  }

  /** Clears user id and traits and starts a new anonymous identity. */
  reset(): void {
    if (this.enriching) throw new ReentrantDispatchError('reset');

    const snapshot = this.deps.identity.dispatch({
      kind: 'reset',
      anonymousId: this.deps.generateAnonymousId(),
    });
    this.deps.log.debug({ version: snapshot.version }, 'Identity reset');
  }

  /** Resolves once every accepted event and identity write has been handed off. */
  async flush(): Promise<void> {
    await this.deps.pipeline.flush();
    if (this.deps.onFlush) await this.deps.onFlush();
  }

  async shutdown(): Promise<void> {
    await this.flush();
    if (this.deps.onShutdown) await this.deps.onShutdown();
    this.deps.log.info('Analytics client shut down');
  }

  // --------------------------------------------------
  // Identify paths, one per entry shape
  // --------------------------------------------------

  private identifyUser(userId: string, options: DispatchOptions | undefined): void {
    this.emit('identify', options, () => {
      const id = requireIdentifier('userId', userId);
      this.deps.identity.dispatch({ kind: 'setUserId', userId: id });
      return this.deps.events.identify(this.deps.identity.state, { messageId: options?.messageId });
    });
  }

  private identifyTraits(traits: unknown, options: DispatchOptions | undefined): void {
    this.emit('identify', options, () => {
      const payload = this.resolvePayload(traits, 'traits');
      if (!payload.ok) return null;

      if (payload.value !== undefined) {
        this.deps.identity.dispatch({ kind: 'setTraits', traits: payload.value });
      }

      const event = this.deps.events.identify(this.deps.identity.state, { messageId: options?.messageId });
      return withPayload(event, payload.value);
    });
  }

  private identifyUserWithTraits(userId: string, traits: unknown, options: DispatchOptions | undefined): void {
    this.emit('identify', options, () => {
      const id = requireIdentifier('userId', userId);
      const payload = this.resolvePayload(traits, 'traits');
      if (!payload.ok) return null;

      this.deps.identity.dispatch(
        payload.value === undefined
          ? { kind: 'setUserIdAndTraits', userId: id }
          : { kind: 'setUserIdAndTraits', userId: id, traits: payload.value },
      );

      const event = this.deps.events.identify(this.deps.identity.state, { messageId: options?.messageId });
      return withPayload(event, payload.value);
    });
  }

  // --------------------------------------------------
  // Shared construction path
  // --------------------------------------------------

  /**
   * Build → enrich → hand off.
   *
   * `build` returns `null` when it has already reported why the event must
   * not be sent. Nothing here holds identity state across the enrichment
   * call; enrichments read it through the client getters.
   */
  private emit(
    method: string,
    options: DispatchOptions | undefined,
    build: () => AnalyticsEvent | null,
  ): void {
    if (this.enriching) throw new ReentrantDispatchError(method);

    let event: AnalyticsEvent | null;
    try {
      if (options?.messageId !== undefined) requireIdentifier('messageId', options.messageId);
      event = build();
    } catch (err: unknown) {
      this.deps.reporter.report(toError(err), true);
      return;
    }

    if (event === null) return;

    let result: ChainResult;
    this.enriching = true;
    try {
      result = applyEnrichments(event, this.registry.resolve(options?.enrichments), this);
    } catch (err: unknown) {
      if (err instanceof ReentrantDispatchError) throw err;
      this.deps.reporter.report(toError(err), true);
      return;
    } finally {
      this.enriching = false;
    }

    if (result.dropped) {
      this.deps.log.debug(
        { type: event.type, messageId: event.messageId, enrichment: result.index },
        'Event dropped by enrichment',
      );
      return;
    }

    try {
      this.deps.pipeline.process(result.event);
    } catch (err: unknown) {
      this.deps.reporter.report(toError(err), false);
      return;
    }

    this.deps.log.debug({ type: result.event.type, messageId: result.event.messageId }, 'Event dispatched');
  }

  private resolvePayload(payload: unknown, field: 'properties' | 'traits'): PayloadResolution {
    if (payload === undefined || payload === null) {
      return { ok: true, value: undefined };
    }

    if (payload instanceof TypedPayload) {
      const parsed = payload.schema.safeParse(payload.value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        this.deps.reporter.report(
          new SerializationError(
            `Typed ${field} failed schema validation: ${issue?.message ?? 'invalid value'}`,
            formatIssuePath(issue?.path ?? []),
            { cause: parsed.error },
          ),
          true,
        );
        return { ok: false };
      }

      const result = this.toMap(parsed.data);
      if (!result.ok) {
        this.deps.reporter.report(result.error, true);
        return { ok: false };
      }
      return { ok: true, value: result.value };
    }

    const result = this.toMap(payload);
    if (!result.ok) {
      this.deps.reporter.report(result.error, false);
      return { ok: true, value: undefined };
    }
    return { ok: true, value: result.value };
  }

  private toMap(value: unknown): MapResult {
    const result = this.deps.serializer.serialize(value);
    if (!result.ok) return result;

    if (!isCanonicalMap(result.value)) {
      return { ok: false, error: new SerializationError('Payload must serialize to a key/value map') };
    }
    return { ok: true, value: result.value };
  }
}
