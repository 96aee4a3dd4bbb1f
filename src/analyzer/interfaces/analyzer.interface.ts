/**
 * Analysis pipeline interfaces
 */

import type {
  AnalysisWarning,
  FpsSummary,
  FrameExtraction,
  FrameExtractionOptions,
  GateConfig,
  GateVerdict,
  TraceLoadDiagnostics,
} from '../../shared/types/index.js';
import type { WarningCollectorOptions } from '../warning-collector.service.js';

/**
 * Options for one pipeline run
 */
export interface AnalyzeOptions {
  gate: GateConfig;
  extraction?: FrameExtractionOptions;
  warnings?: WarningCollectorOptions;
}

/**
 * Everything one run derives from a trace
 */
export interface AnalysisOutcome {
  summary: FpsSummary;
  verdict: GateVerdict;
  extraction: FrameExtraction;
  warnings: AnalysisWarning[];
  diagnostics: TraceLoadDiagnostics;
}

/**
 * Analysis pipeline interface
 */
export interface IAnalysisPipeline {
  run(raw: Buffer | string, options: AnalyzeOptions): AnalysisOutcome;
}
