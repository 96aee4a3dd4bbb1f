/**
 * Configuration types for fps-gate (.fps-gate/config.yaml)
 */

import type { StatisticName } from './gate.types.js';
import type { TrimStrategyKind } from './frame.types.js';

export interface OutlierTrimConfig {
  strategy: TrimStrategyKind;
  /** Used by drop-first-n */
  n?: number;
  /** Used by drop-beyond-std-dev */
  k?: number;
}

export interface GateSectionConfig {
  minAcceptableFps: number;
  statisticUnderTest: StatisticName;
  outlierTrim: OutlierTrimConfig;
}

export interface ExtractionConfig {
  frameMarkers: string[];
  processId?: number;
  threadId?: number;
}

export interface WarningsConfig {
  longTaskThresholdMs: number;
}

export interface OutputConfig {
  reportsDir: string;
}

export interface Config {
  version: string;
  gate: GateSectionConfig;
  extraction: ExtractionConfig;
  warnings: WarningsConfig;
  output: OutputConfig;
}
