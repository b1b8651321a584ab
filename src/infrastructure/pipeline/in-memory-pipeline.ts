import type { Logger } from 'pino';
import type { AnalyticsEvent, EventPipeline } from '../../domain/index.js';

export const DEFAULT_MAX_EVENTS = 1000;

/**
 * Bounded in-process pipeline.
 *
 * Keeps the most recent `maxEvents` events in arrival order; once full, the
 * oldest event is discarded for each new one. Used when no external
 * transport is configured, and by tests.
 */
export class InMemoryPipeline implements EventPipeline {
  private readonly buffer: AnalyticsEvent[] = [];
  private readonly maxEvents: number;
  private readonly log: Logger | undefined;
  private discarded = 0;

  constructor(maxEvents: number = DEFAULT_MAX_EVENTS, log?: Logger) {
    this.maxEvents = maxEvents;
    this.log = log;
  }

  process(event: AnalyticsEvent): void {
    this.buffer.push(event);
    if (this.buffer.length > this.maxEvents) {
      const oldest = this.buffer.shift();
      this.discarded++;
      this.log?.warn(
        { messageId: oldest?.messageId, maxEvents: this.maxEvents },
        'In-memory pipeline full, oldest event discarded',
      );
    }
  }

  async flush(): Promise<void> {
    // Nothing in flight: process() completes synchronously.
  }

  /** Copy of the events currently buffered, oldest first. */
  get events(): readonly AnalyticsEvent[] {
    return [...this.buffer];
  }

  /** Number of events discarded because the buffer was full. */
  get discardedCount(): number {
    return this.discarded;
  }

  /** Removes and returns every buffered event. */
  drain(): AnalyticsEvent[] {
    return this.buffer.splice(0, this.buffer.length);
  }
}
