/**
 * Frame Interval Extractor
 * Turns frame boundary markers into instantaneous FPS samples
 */

import { Injectable, Logger } from '@nestjs/common';
import type {
  FrameExtraction,
  FrameExtractionOptions,
  FrameSample,
} from '../shared/types/index.js';
import type { TraceEventStore } from '../trace/trace-event-store.js';

// Compositor emits one DrawFrame per presented frame
export const DEFAULT_FRAME_MARKERS: readonly string[] = ['DrawFrame'];

const MICROSECONDS_PER_SECOND = 1_000_000;

@Injectable()
export class FrameExtractorService {
  private readonly logger = new Logger(FrameExtractorService.name);

  /**
   * Produce one sample per adjacent pair of frame boundaries.
   *
   * The first boundary has no predecessor and yields no sample; fewer than
   * two boundaries yield an empty sequence. Pairs with a zero or negative
   * interval are skipped and counted in `excludedIntervalCount`.
   */
  extractFrameSamples(
    store: TraceEventStore,
    options: FrameExtractionOptions = {},
  ): FrameExtraction {
    const markers = new Set(options.frameMarkers ?? DEFAULT_FRAME_MARKERS);
    const { processId, threadId } = options;

    const boundaries = store.filter(
      (event) =>
        markers.has(event.name) &&
        (processId === undefined || event.processId === processId) &&
        (threadId === undefined || event.threadId === threadId),
    );

    const samples: FrameSample[] = [];
    let excludedIntervalCount = 0;

    for (let i = 1; i < boundaries.length; i++) {
      const previous = boundaries[i - 1];
      const current = boundaries[i];
      if (!previous || !current) continue;

      const intervalUs = current.startTimestamp - previous.startTimestamp;
      if (intervalUs <= 0) {
        excludedIntervalCount++;
        continue;
      }

      samples.push(
        Object.freeze({
          timestamp: current.startTimestamp,
          instantaneousFps: MICROSECONDS_PER_SECOND / intervalUs,
        }),
      );
    }

    if (excludedIntervalCount > 0) {
      this.logger.warn(
        `Excluded ${excludedIntervalCount} frame interval(s) with a zero or negative duration`,
      );
    }

    return Object.freeze({
      samples: Object.freeze(samples),
      boundaryCount: boundaries.length,
      excludedIntervalCount,
    });
  }
}
