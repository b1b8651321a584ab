import type { CanonicalMap } from './canonical-value.js';

/**
 * Core domain types for the analytics event model.
 *
 * The five variants form a closed union discriminated by `type`. Events are
 * frozen once built; any change produces a new event value.
 */

export const EVENT_TYPES = ['track', 'identify', 'screen', 'group', 'alias'] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** Fields shared by every event. */
export interface EventEnvelope<T extends EventType> {
  readonly type: T;
  readonly messageId: string;
  readonly timestamp: string; // ISO-8601
  readonly anonymousId: string;
  readonly userId?: string;
  /** Filled by later pipeline stages or enrichments; empty at construction. */
  readonly context: CanonicalMap;
  readonly integrations: CanonicalMap;
}

export interface TrackEvent extends EventEnvelope<'track'> {
  readonly event: string;
  readonly properties?: CanonicalMap;
}

export interface IdentifyEvent extends EventEnvelope<'identify'> {
  readonly traits?: CanonicalMap;
}

export interface ScreenEvent extends EventEnvelope<'screen'> {
  readonly name: string;
  readonly category?: string;
  readonly properties?: CanonicalMap;
}

export interface GroupEvent extends EventEnvelope<'group'> {
  readonly groupId: string;
  readonly traits?: CanonicalMap;
}

export interface AliasEvent extends EventEnvelope<'alias'> {
  readonly newId: string;
  readonly previousId: string;
}

export type AnalyticsEvent = TrackEvent | IdentifyEvent | ScreenEvent | GroupEvent | AliasEvent;

export type EventOfType<T extends EventType> = Extract<AnalyticsEvent, { readonly type: T }>;

export function isEventOfType<T extends EventType>(
  event: AnalyticsEvent,
  type: T,
): event is EventOfType<T> {
  return event.type === type;
}
