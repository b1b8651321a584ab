import type { AnalyticsEvent, Enrichment, EnrichmentClient } from '../domain/index.js';
import { EnrichmentError, ReentrantDispatchError, toError } from '../domain/index.js';
import { freezeEvent } from './event-builder.js';

/**
 * Outcome of running an event through the chain.
 *
 * `dropped === true` carries the position of the enrichment that dropped it.
 */
export type ChainResult =
  | { readonly dropped: false; readonly event: AnalyticsEvent }
  | { readonly dropped: true; readonly index: number };

function label(enrichment: Enrichment, index: number): string {
  return enrichment.name === '' ? `#${index}` : `"${enrichment.name}" (#${index})`;
}

/**
 * Applies enrichments in order.
 *
 * Pure orchestration:
 * 1. Each enrichment receives the event produced by the previous one.
 * 2. The first `null` halts the chain; later enrichments never run.
 * 3. An enrichment that throws, or returns an event of another kind, fails
 *    the chain with `EnrichmentError`.
 * 4. The surviving event is deep-frozen before it is returned.
 *
 * `ReentrantDispatchError` is rethrown untouched: it signals a programming
 * error in the enrichment itself, not a failure of this event.
 */
export function applyEnrichments(
  event: AnalyticsEvent,
  enrichments: readonly Enrichment[],
  client: EnrichmentClient,
): ChainResult {
  let current = event;

  for (const [index, enrichment] of enrichments.entries()) {
    let next: AnalyticsEvent | null;
    try {
      next = enrichment(current, client);
    } catch (err: unknown) {
      if (err instanceof ReentrantDispatchError) throw err;
      throw new EnrichmentError(
        `Enrichment ${label(enrichment, index)} threw while processing a ${current.type} event`,
        index,
        { cause: toError(err) },
      );
    }

    if (next === null) {
      return { dropped: true, index };
    }

    if (next.type !== current.type) {
      throw new EnrichmentError(
        `Enrichment ${label(enrichment, index)} turned a ${current.type} event into a ${next.type} event`,
        index,
      );
    }

    current = next;
  }

  return { dropped: false, event: freezeEvent(current) };
}

/**
 * Ordered, pipeline-wide enrichment list. Registration order is application
 * order; call-scoped enrichments are appended after these on every dispatch.
 */
export class EnrichmentRegistry {
  private entries: readonly Enrichment[] = [];

  constructor(initial: readonly Enrichment[] = []) {
    this.entries = [...initial];
  }

  /** Returns the current list. Safe to hold across later `add()` calls. */
  get(): readonly Enrichment[] {
    return this.entries;
  }

  /** Appends an enrichment; the returned handle removes that registration. */
  add(enrichment: Enrichment): { remove(): void } {
    this.entries = [...this.entries, enrichment];
    let removed = false;
    return {
      remove: () => {
        if (removed) return;
        removed = true;
        const at = this.entries.indexOf(enrichment);
        if (at !== -1) {
          this.entries = [...this.entries.slice(0, at), ...this.entries.slice(at + 1)];
        }
      },
    };
  }

  /** Combines pipeline-wide entries with call-scoped ones. */
  resolve(callScoped: readonly Enrichment[] | undefined): readonly Enrichment[] {
    if (callScoped === undefined || callScoped.length === 0) return this.entries;
    return [...this.entries, ...callScoped];
  }
}
