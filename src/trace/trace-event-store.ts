/**
 * Trace Event Store
 *
 * Read-only, time-ordered view of the timed events of one trace. Built once
 * by TraceLoaderService and discarded when the analysis run completes.
 */

import type {
  TraceCategory,
  TraceEvent,
  TraceLoadDiagnostics,
  TraceTimeRange,
} from '../shared/types/index.js';

function compareEvents(a: TraceEvent, b: TraceEvent): number {
  return a.startTimestamp - b.startTimestamp || a.sequence - b.sequence;
}

export class TraceEventStore {
  private constructor(
    private readonly events: readonly TraceEvent[],
    readonly diagnostics: Readonly<TraceLoadDiagnostics>,
  ) {}

  /**
   * Build a store; events are sorted by start time, ties by file order
   */
  static fromEvents(
    events: readonly TraceEvent[],
    diagnostics: TraceLoadDiagnostics,
  ): TraceEventStore {
    const sorted = events
      .map((event) => Object.freeze({ ...event }))
      .sort(compareEvents);
    return new TraceEventStore(
      Object.freeze(sorted),
      Object.freeze({ ...diagnostics }),
    );
  }

  get size(): number {
    return this.events.length;
  }

  all(): readonly TraceEvent[] {
    return this.events;
  }

  filter(predicate: (event: TraceEvent) => boolean): TraceEvent[] {
    return this.events.filter(predicate);
  }

  byCategory(category: TraceCategory): TraceEvent[] {
    return this.events.filter((event) => event.category === category);
  }

  byName(names: Iterable<string>): TraceEvent[] {
    const wanted = new Set(names);
    return this.events.filter((event) => wanted.has(event.name));
  }

  /**
   * Earliest start and latest end, or null for an empty store
   */
  timeRange(): TraceTimeRange | null {
    const first = this.events[0];
    if (!first) return null;

    let endTime = -Infinity;
    for (const event of this.events) {
      const eventEnd = event.startTimestamp + event.duration;
      if (eventEnd > endTime) endTime = eventEnd;
    }

    return { startTime: first.startTimestamp, endTime };
  }

  threadIds(): number[] {
    return [...new Set(this.events.map((event) => event.threadId))].sort(
      (a, b) => a - b,
    );
  }
}
