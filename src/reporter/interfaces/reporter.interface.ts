/**
 * Reporter interfaces for terminal and JSON gate reports
 */

import type {
  AnalysisWarning,
  StatisticName,
} from '../../shared/types/index.js';

/**
 * Flat record handed to report sinks: one per analyzed trace.
 * Field names follow FpsSummary and GateVerdict.
 */
export interface GateReportRecord {
  trace: string;
  mean: number;
  median: number;
  standardDeviation: number;
  trimmedMean: number;
  sampleCount: number;
  minValue: number;
  maxValue: number;
  trimmedSampleCount: number;
  /** e.g. `drop-first-n(1)` */
  trimStrategy: string;
  passed: boolean;
  observedValue: number;
  threshold: number;
  statisticUsed: StatisticName;
  reasons: string[];
  boundaryCount: number;
  excludedIntervalCount: number;
  warnings: AnalysisWarning[];
  generatedAt: string;
}

/**
 * Destination for gate results (files, dashboards, alerting)
 */
export interface ReportSink {
  publish(record: GateReportRecord): Promise<void>;
  /** Flush anything buffered; called once after the last record */
  close?(): Promise<void>;
}

/**
 * Options for terminal report generation
 */
export interface TerminalReportOptions {
  /** Whether to colorize output */
  colorize?: boolean;
  /** Whether to show load and extraction diagnostics */
  verbose?: boolean;
}

/**
 * Options for JSON report generation
 */
export interface JSONReportOptions {
  /** Whether to pretty-print the JSON */
  prettyPrint?: boolean;
  /** Indentation level for pretty printing */
  indent?: number;
}
