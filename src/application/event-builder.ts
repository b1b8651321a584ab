import type {
  AliasEvent,
  AnalyticsEvent,
  CanonicalMap,
  EventEnvelope,
  EventType,
  GroupEvent,
  IdentifyEvent,
  IdentityState,
  ScreenEvent,
  TrackEvent,
} from '../domain/index.js';
import { EMPTY_MAP, freezeCanonical } from '../domain/index.js';
import { requireIdentifier } from './event-schema.js';

/**
 * Returns an ISO-8601 timestamp source that never goes backwards, even if
 * the wall clock does. `nowFn` is injectable for tests.
 */
export function createMonotonicClock(nowFn: () => number = Date.now): () => string {
  let last = Number.NEGATIVE_INFINITY;
  return () => {
    last = Math.max(last, nowFn());
    return new Date(last).toISOString();
  };
}

export interface EventFactoryDeps {
  readonly generateId: () => string;
  readonly timestamp: () => string;
}

/** Per-call envelope input shared by every builder. */
export interface EnvelopeInput {
  readonly messageId?: string | undefined;
}

/**
 * Builds frozen, payload-less events. Payloads are attached afterwards with
 * `withPayload`, so the "no payload" and "absent payload" paths are one path.
 *
 * Required identifiers are validated here; an empty value throws
 * `InvalidEventError`.
 */
export class EventFactory {
  private readonly deps: EventFactoryDeps;

  constructor(deps: EventFactoryDeps) {
    this.deps = deps;
  }

  track(identity: IdentityState, input: EnvelopeInput & { readonly event: string }): TrackEvent {
    const event = requireIdentifier('event', input.event);
    return Object.freeze({ ...this.envelope('track', identity, input), event });
  }

  identify(identity: IdentityState, input: EnvelopeInput = {}): IdentifyEvent {
    return Object.freeze(this.envelope('identify', identity, input));
  }

  screen(
    identity: IdentityState,
    input: EnvelopeInput & { readonly title: string; readonly category?: string | null | undefined },
  ): ScreenEvent {
    const name = requireIdentifier('title', input.title);
    const envelope = this.envelope('screen', identity, input);
    return Object.freeze(
      input.category === undefined || input.category === null
        ? { ...envelope, name }
        : { ...envelope, name, category: input.category },
    );
  }

  group(identity: IdentityState, input: EnvelopeInput & { readonly groupId: string }): GroupEvent {
    const groupId = requireIdentifier('groupId', input.groupId);
    return Object.freeze({ ...this.envelope('group', identity, input), groupId });
  }

  alias(
    identity: IdentityState,
    input: EnvelopeInput & { readonly newId: string; readonly previousId: string },
  ): AliasEvent {
    const newId = requireIdentifier('newId', input.newId);
    const previousId = requireIdentifier('previousId', input.previousId);
    return Object.freeze({ ...this.envelope('alias', identity, input), newId, previousId });
  }

  private envelope<T extends EventType>(
    type: T,
    identity: IdentityState,
    input: EnvelopeInput,
  ): EventEnvelope<T> {
    const messageId = input.messageId === undefined
      ? this.deps.generateId()
      : requireIdentifier('messageId', input.messageId);

    const base = {
      type,
      messageId,
      timestamp: this.deps.timestamp(),
      anonymousId: identity.anonymousId,
      context: EMPTY_MAP,
      integrations: EMPTY_MAP,
    };

    return identity.userId === undefined ? base : { ...base, userId: identity.userId };
  }
}

/**
 * Returns a copy of `event` with its payload replaced: `properties` for
 * track/screen, `traits` for identify/group. Alias carries no payload and is
 * returned unchanged. `undefined` removes the payload.
 */
export function withPayload(event: TrackEvent, payload: CanonicalMap | undefined): TrackEvent;
export function withPayload(event: IdentifyEvent, payload: CanonicalMap | undefined): IdentifyEvent;
export function withPayload(event: ScreenEvent, payload: CanonicalMap | undefined): ScreenEvent;
export function withPayload(event: GroupEvent, payload: CanonicalMap | undefined): GroupEvent;
export function withPayload(event: AliasEvent, payload: CanonicalMap | undefined): AliasEvent;
export function withPayload(event: AnalyticsEvent, payload: CanonicalMap | undefined): AnalyticsEvent;
export function withPayload(event: AnalyticsEvent, payload: CanonicalMap | undefined): AnalyticsEvent {
  const frozen = payload === undefined ? undefined : freezeCanonical(payload);

  switch (event.type) {
    case 'track': {
      const { properties: _previous, ...rest } = event;
      return Object.freeze(frozen === undefined ? rest : { ...rest, properties: frozen });
    }
    case 'screen': {
      const { properties: _previous, ...rest } = event;
      return Object.freeze(frozen === undefined ? rest : { ...rest, properties: frozen });
    }
    case 'identify': {
      const { traits: _previous, ...rest } = event;
      return Object.freeze(frozen === undefined ? rest : { ...rest, traits: frozen });
    }
    case 'group': {
      const { traits: _previous, ...rest } = event;
      return Object.freeze(frozen === undefined ? rest : { ...rest, traits: frozen });
    }
    case 'alias':
      return event;
  }
}

/** Returns the payload carried by `event`, if any. */
export function payloadOf(event: AnalyticsEvent): CanonicalMap | undefined {
  switch (event.type) {
    case 'track':
    case 'screen':
      return event.properties;
    case 'identify':
    case 'group':
      return event.traits;
    case 'alias':
      return undefined;
  }
}

/**
 * Freezes an event and every canonical map it carries. Used on events coming
 * back from enrichments, which may have been assembled by hand.
 */
export function freezeEvent<E extends AnalyticsEvent>(event: E): E {
  freezeCanonical(event.context);
  freezeCanonical(event.integrations);
  const payload = payloadOf(event);
  if (payload !== undefined) freezeCanonical(payload);
  Object.freeze(event);
  return event;
}

export function withContext<E extends AnalyticsEvent>(event: E, context: CanonicalMap): E {
  const next: E = { ...event, context: freezeCanonical(context) };
  Object.freeze(next);
  return next;
}

export function withIntegrations<E extends AnalyticsEvent>(event: E, integrations: CanonicalMap): E {
  const next: E = { ...event, integrations: freezeCanonical(integrations) };
  Object.freeze(next);
  return next;
}
