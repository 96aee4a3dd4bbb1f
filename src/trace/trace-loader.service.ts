/**
 * Trace Loader Service
 * Parses raw Chrome trace-event JSON into a TraceEventStore
 *
 * Both envelopes of the trace-event format are accepted: an object with a
 * `traceEvents` array, or a bare array of records. The envelope must be
 * complete; a truncated array is rejected rather than partially loaded.
 */

import { Injectable, Logger } from '@nestjs/common';
import type {
  TraceEvent,
  TraceLoadDiagnostics,
} from '../shared/types/index.js';
import { TraceParseError } from '../errors/error-types.js';
import { classifyEvent } from './trace-categories.js';
import { TraceEventStore } from './trace-event-store.js';

const BYTE_ORDER_MARK = 0xfeff;

type EventDraft = {
  -readonly [K in keyof TraceEvent]: TraceEvent[K];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteNumberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value)
    ? value
    : fallback;
}

@Injectable()
export class TraceLoaderService {
  private readonly logger = new Logger(TraceLoaderService.name);

  /**
   * Load a trace from raw bytes
   * @throws TraceParseError when the envelope or a timed record is malformed
   */
  load(raw: Buffer | string): TraceEventStore {
    const text = typeof raw === 'string' ? raw : raw.toString('utf-8');
    const records = this.parseEnvelope(text);

    const diagnostics: TraceLoadDiagnostics = {
      recordCount: records.length,
      metadataRecordCount: 0,
      unknownCategoryCount: 0,
      unmatchedEndCount: 0,
      unclosedBeginCount: 0,
    };
    const drafts: EventDraft[] = [];
    // Open `B` records per "pid:tid", innermost last
    const openBegins = new Map<string, EventDraft[]>();

    records.forEach((record, index) => {
      if (!isRecord(record)) {
        throw new TraceParseError(`record ${index} is not an object`);
      }

      const phase = typeof record['ph'] === 'string' ? record['ph'] : '';
      if (phase === 'M') {
        diagnostics.metadataRecordCount++;
        return;
      }

      const ts = record['ts'];
      if (typeof ts !== 'number' || !Number.isFinite(ts)) {
        throw new TraceParseError(
          `record ${index} has no numeric 'ts' timestamp`,
        );
      }

      const dur = record['dur'];
      if (
        dur !== undefined &&
        (typeof dur !== 'number' || !Number.isFinite(dur) || dur < 0)
      ) {
        throw new TraceParseError(
          `record ${index} has an invalid 'dur' (${String(dur)})`,
        );
      }
      const duration = typeof dur === 'number' ? dur : 0;

      const processId = finiteNumberOr(record['pid'], 0);
      const threadId = finiteNumberOr(record['tid'], 0);
      const threadKey = `${processId}:${threadId}`;

      if (phase === 'E') {
        const begin = openBegins.get(threadKey)?.pop();
        if (!begin) {
          diagnostics.unmatchedEndCount++;
          return;
        }
        if (ts < begin.startTimestamp) {
          throw new TraceParseError(
            `record ${index} ends before its begin record ${begin.sequence}`,
          );
        }
        begin.duration = ts - begin.startTimestamp;
        return;
      }

      const name = typeof record['name'] === 'string' ? record['name'] : '';
      const cat = typeof record['cat'] === 'string' ? record['cat'] : '';
      const category = classifyEvent(name, cat);
      if (!category) {
        diagnostics.unknownCategoryCount++;
      }

      const draft: EventDraft = {
        name,
        category: category ?? 'other',
        startTimestamp: ts,
        duration,
        threadId,
        processId,
        sequence: index,
      };
      drafts.push(draft);

      if (phase === 'B') {
        const stack = openBegins.get(threadKey) ?? [];
        stack.push(draft);
        openBegins.set(threadKey, stack);
      }
    });

    for (const stack of openBegins.values()) {
      diagnostics.unclosedBeginCount += stack.length;
    }
    if (diagnostics.unclosedBeginCount > 0) {
      this.logger.warn(
        `${diagnostics.unclosedBeginCount} begin event(s) were never closed; kept with zero duration`,
      );
    }

    const store = TraceEventStore.fromEvents(drafts, diagnostics);
    this.logger.debug(
      `Loaded ${store.size} timed event(s) from ${diagnostics.recordCount} record(s)`,
    );
    return store;
  }

  /**
   * Decode the outer JSON structure and return its records
   */
  private parseEnvelope(text: string): unknown[] {
    const body = text.charCodeAt(0) === BYTE_ORDER_MARK ? text.slice(1) : text;
    if (body.trim().length === 0) {
      throw new TraceParseError('trace is empty');
    }

    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      throw new TraceParseError(
        'malformed JSON framing',
        error instanceof Error ? error : undefined,
      );
    }

    if (Array.isArray(document)) {
      return document;
    }
    if (isRecord(document)) {
      const events = document['traceEvents'];
      if (Array.isArray(events)) {
        return events;
      }
      throw new TraceParseError("'traceEvents' must be an array");
    }
    throw new TraceParseError(
      'expected an array of records or an object with a traceEvents array',
    );
  }
}
