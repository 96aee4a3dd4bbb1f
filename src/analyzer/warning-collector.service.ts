/**
 * Warning Collector
 * Reports long tasks and forced layouts next to the frame-rate verdict.
 * Warnings are informational; they never change whether the gate passes.
 */

import { Injectable } from '@nestjs/common';
import type { AnalysisWarning, TraceEvent } from '../shared/types/index.js';
import type { TraceEventStore } from '../trace/trace-event-store.js';

// Default long task threshold in milliseconds
export const LONG_TASK_THRESHOLD_MS = 50;

export interface WarningCollectorOptions {
  longTaskThresholdMs?: number;
}

@Injectable()
export class WarningCollectorService {
  collect(
    store: TraceEventStore,
    options: WarningCollectorOptions = {},
  ): AnalysisWarning[] {
    const warnings: AnalysisWarning[] = [];
    const thresholdMs = options.longTaskThresholdMs ?? LONG_TASK_THRESHOLD_MS;

    const longTasks = this.countLongTasks(store, thresholdMs);
    if (longTasks > 0) {
      warnings.push({
        code: 'LONG_TASKS',
        message: `${longTasks} script task(s) ran for ${thresholdMs}ms or longer`,
        count: longTasks,
      });
    }

    const forcedLayouts = this.countForcedLayouts(store);
    if (forcedLayouts > 0) {
      warnings.push({
        code: 'FORCED_LAYOUTS',
        message: `${forcedLayouts} layout(s) were forced synchronously by script`,
        count: forcedLayouts,
      });
    }

    return warnings;
  }

  private countLongTasks(store: TraceEventStore, thresholdMs: number): number {
    const thresholdUs = thresholdMs * 1000;
    return store.filter(
      (event) => event.category === 'script' && event.duration >= thresholdUs,
    ).length;
  }

  /**
   * A Layout that starts and ends inside a script event on the same thread
   * was requested by that script, not by the frame lifecycle.
   */
  private countForcedLayouts(store: TraceEventStore): number {
    const scriptsByThread = new Map<string, TraceEvent[]>();
    for (const event of store.byCategory('script')) {
      const key = `${event.processId}:${event.threadId}`;
      const scripts = scriptsByThread.get(key) ?? [];
      scripts.push(event);
      scriptsByThread.set(key, scripts);
    }

    let count = 0;
    for (const layout of store.byName(['Layout'])) {
      const scripts =
        scriptsByThread.get(`${layout.processId}:${layout.threadId}`) ?? [];
      const layoutEnd = layout.startTimestamp + layout.duration;
      const enclosed = scripts.some(
        (script) =>
          script.startTimestamp <= layout.startTimestamp &&
          script.startTimestamp + script.duration >= layoutEnd,
      );
      if (enclosed) count++;
    }
    return count;
  }
}
