import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  AnalyticsEvent,
  Enrichment,
  ErrorReporter,
  EventOfType,
  EventPipeline,
  EventType,
  IdentityState,
  Serializer,
  TrackEvent,
} from '../src/domain/index.js';
import { EMPTY_MAP, isEventOfType } from '../src/domain/index.js';
import {
  Analytics,
  EventFactory,
  IdentityStore,
  createMonotonicClock,
} from '../src/application/index.js';
import { InMemoryPipeline, createJsonSerializer } from '../src/infrastructure/index.js';

/** Fixed "now" for deterministic envelope timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();
export const FIXED_TIMESTAMP = '2026-02-18T12:00:00.000Z';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

let counter = 0;

/**
 * Factory for creating track events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeTrackEvent(overrides: Partial<TrackEvent> = {}): TrackEvent {
  counter++;
  const base: TrackEvent = {
    type: 'track',
    messageId: overrides.messageId ?? `test-${counter}`,
    timestamp: overrides.timestamp ?? FIXED_TIMESTAMP,
    anonymousId: overrides.anonymousId ?? 'anon-test',
    context: overrides.context ?? EMPTY_MAP,
    integrations: overrides.integrations ?? EMPTY_MAP,
    event: overrides.event ?? 'Test Event',
  };
  return overrides.properties === undefined ? base : { ...base, properties: overrides.properties };
}

export interface Report {
  readonly error: Error;
  readonly fatal: boolean;
}

export interface HarnessOptions {
  readonly enrichments?: readonly Enrichment[];
  readonly serializer?: Serializer;
  readonly pipeline?: EventPipeline;
  readonly initial?: IdentityState;
}

export interface Harness {
  readonly analytics: Analytics;
  readonly pipeline: InMemoryPipeline;
  readonly identity: IdentityStore;
  readonly reports: Report[];
  readonly log: Logger;
}

/**
 * Gateway wired to in-process collaborators.
 *
 * Message ids are `msg-1`, `msg-2`, ...; anonymous ids produced by `reset()`
 * are `anon-1`, `anon-2`, ...; the initial anonymous id is `anon-0`.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const log = fakeLogger();
  const reports: Report[] = [];
  const reporter: ErrorReporter = {
    report: (error, fatal) => {
      reports.push({ error, fatal });
    },
  };
  const pipeline = new InMemoryPipeline();
  const identity = new IdentityStore(options.initial ?? { anonymousId: 'anon-0' }, log);

  let messages = 0;
  let anonymous = 0;

  const analytics = new Analytics({
    identity,
    pipeline: options.pipeline ?? pipeline,
    serializer: options.serializer ?? createJsonSerializer(),
    reporter,
    events: new EventFactory({
      generateId: () => `msg-${++messages}`,
      timestamp: createMonotonicClock(() => FIXED_NOW),
    }),
    log,
    generateAnonymousId: () => `anon-${++anonymous}`,
    enrichments: options.enrichments ?? [],
  });

  return { analytics, pipeline, identity, reports, log };
}

export function eventAt(pipeline: InMemoryPipeline, index: number): AnalyticsEvent {
  const event = pipeline.events[index];
  if (event === undefined) throw new Error(`No event at index ${index}`);
  return event;
}

export function eventOfType<T extends EventType>(
  pipeline: InMemoryPipeline,
  index: number,
  type: T,
): EventOfType<T> {
  const event = eventAt(pipeline, index);
  if (!isEventOfType(event, type)) {
    throw new Error(`Expected a ${type} event at index ${index}, got ${event.type}`);
  }
  return event;
}
