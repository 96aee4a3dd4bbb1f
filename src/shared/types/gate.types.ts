/**
 * Quality gate types
 */

import type { TrimStrategy } from './frame.types.js';

export type StatisticName = 'mean' | 'median' | 'trimmedMean';

export const STATISTIC_NAMES: readonly StatisticName[] = [
  'mean',
  'median',
  'trimmedMean',
];

export interface GateConfig {
  /** Fail when the statistic under test falls below this */
  minAcceptableFps: number;
  outlierTrimStrategy: TrimStrategy;
  statisticUnderTest: StatisticName;
}

export interface GateVerdict {
  readonly passed: boolean;
  readonly observedValue: number;
  readonly threshold: number;
  readonly statisticUsed: StatisticName;
  readonly reasons: readonly string[];
}

export type WarningCode = 'LONG_TASKS' | 'FORCED_LAYOUTS';

/**
 * Auxiliary finding reported next to the verdict; never affects `passed`
 */
export interface AnalysisWarning {
  code: WarningCode;
  message: string;
  count: number;
}
