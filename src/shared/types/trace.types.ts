/**
 * Trace data types
 *
 * RawTraceEvent mirrors one record of the Chrome trace-event format as
 * written by DevTools and CDP tracing. TraceEvent is the normalized,
 * immutable form kept by the TraceEventStore.
 */

export interface RawTraceEvent {
  pid?: number;
  tid?: number;
  ts?: number;
  ph?: string;
  cat?: string;
  name?: string;
  args?: Record<string, unknown>;
  dur?: number;
  tdur?: number;
  s?: string;
}

/** Object envelope: `{ "traceEvents": [...] }` */
export interface RawTraceDocument {
  traceEvents: RawTraceEvent[];
  metadata?: Record<string, unknown>;
}

export type TraceCategory =
  | 'render'
  | 'script'
  | 'paint'
  | 'composite'
  | 'other';

export interface TraceEvent {
  readonly name: string;
  readonly category: TraceCategory;
  /** Monotonic microseconds */
  readonly startTimestamp: number;
  /** Microseconds, zero for instantaneous markers */
  readonly duration: number;
  readonly threadId: number;
  readonly processId: number;
  /** Position of the record in the source file */
  readonly sequence: number;
}

export interface TraceLoadDiagnostics {
  /** Records present in the envelope, metadata included */
  recordCount: number;
  metadataRecordCount: number;
  unknownCategoryCount: number;
  /** `E` records with no open `B` on the same thread */
  unmatchedEndCount: number;
  /** `B` records never closed; kept with zero duration */
  unclosedBeginCount: number;
}

export interface TraceTimeRange {
  startTime: number;
  endTime: number;
}
