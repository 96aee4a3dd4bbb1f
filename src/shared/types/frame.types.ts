/**
 * Frame sampling and summary types
 */

export interface FrameSample {
  /** Timestamp of the closing frame boundary, microseconds */
  readonly timestamp: number;
  readonly instantaneousFps: number;
}

export interface FrameExtraction {
  readonly samples: readonly FrameSample[];
  /** Boundary markers seen, including the first one */
  readonly boundaryCount: number;
  /** Adjacent boundary pairs skipped for a zero or negative interval */
  readonly excludedIntervalCount: number;
}

export interface FrameExtractionOptions {
  /** Event names treated as frame boundaries (default: DrawFrame) */
  frameMarkers?: readonly string[];
  /**
   * Only consider markers recorded in this process. Without it markers from
   * every process form one stream, which assumes a single compositor
   * emits them.
   */
  processId?: number;
  /** Only consider markers recorded on this thread */
  threadId?: number;
}

export type TrimStrategy =
  | { readonly kind: 'none' }
  | { readonly kind: 'drop-first-n'; readonly n: number }
  | { readonly kind: 'drop-beyond-std-dev'; readonly k: number };

export type TrimStrategyKind = TrimStrategy['kind'];

export interface FpsSummary {
  readonly mean: number;
  readonly median: number;
  readonly standardDeviation: number;
  readonly trimmedMean: number;
  readonly sampleCount: number;
  readonly minValue: number;
  readonly maxValue: number;
  /** Samples left after trimming */
  readonly trimmedSampleCount: number;
  readonly trimStrategy: TrimStrategy;
}
