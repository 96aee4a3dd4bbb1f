/**
 * JSON Reporter
 * Builds the flat gate record and renders it as JSON
 */

import { Injectable } from '@nestjs/common';
import type { TrimStrategy } from '../shared/types/index.js';
import type { AnalysisOutcome } from '../analyzer/interfaces/index.js';
import type {
  GateReportRecord,
  JSONReportOptions,
} from './interfaces/index.js';

/**
 * Short label for a trim strategy, e.g. `drop-first-n(1)`
 */
export function describeTrimStrategy(strategy: TrimStrategy): string {
  switch (strategy.kind) {
    case 'none':
      return 'none';
    case 'drop-first-n':
      return `drop-first-n(${strategy.n})`;
    case 'drop-beyond-std-dev':
      return `drop-beyond-std-dev(${strategy.k})`;
  }
}

@Injectable()
export class JSONReporter {
  /**
   * Flatten one analysis outcome into a report record
   */
  buildRecord(
    trace: string,
    outcome: AnalysisOutcome,
    generatedAt: Date = new Date(),
  ): GateReportRecord {
    const { summary, verdict, extraction } = outcome;

    return {
      trace,
      mean: summary.mean,
      median: summary.median,
      standardDeviation: summary.standardDeviation,
      trimmedMean: summary.trimmedMean,
      sampleCount: summary.sampleCount,
      minValue: summary.minValue,
      maxValue: summary.maxValue,
      trimmedSampleCount: summary.trimmedSampleCount,
      trimStrategy: describeTrimStrategy(summary.trimStrategy),
      passed: verdict.passed,
      observedValue: verdict.observedValue,
      threshold: verdict.threshold,
      statisticUsed: verdict.statisticUsed,
      reasons: [...verdict.reasons],
      boundaryCount: extraction.boundaryCount,
      excludedIntervalCount: extraction.excludedIntervalCount,
      warnings: outcome.warnings.map((w) => ({ ...w })),
      generatedAt: generatedAt.toISOString(),
    };
  }

  /**
   * Render records as JSON
   */
  generate(
    records: GateReportRecord | GateReportRecord[],
    options: JSONReportOptions = {},
  ): string {
    const { prettyPrint = true, indent = 2 } = options;

    return prettyPrint
      ? JSON.stringify(records, null, indent)
      : JSON.stringify(records);
  }
}
