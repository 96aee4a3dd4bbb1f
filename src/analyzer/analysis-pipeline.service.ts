/**
 * Analysis Pipeline
 *
 * raw trace -> TraceEventStore -> FrameSample[] -> FpsSummary -> GateVerdict
 *
 * Each stage is a pure derivation of the previous one. Errors from any stage
 * (ConfigError, TraceParseError, InsufficientDataError) propagate unchanged
 * and end the run; nothing is retried here.
 */

import { Injectable, Logger } from '@nestjs/common';
import { TraceLoaderService } from '../trace/trace-loader.service.js';
import { FrameExtractorService } from '../frames/frame-extractor.service.js';
import { SummarizerService } from '../stats/summarizer.service.js';
import { GateEvaluatorService } from '../gate/gate-evaluator.service.js';
import { WarningCollectorService } from './warning-collector.service.js';
import type {
  AnalysisOutcome,
  AnalyzeOptions,
  IAnalysisPipeline,
} from './interfaces/index.js';

@Injectable()
export class AnalysisPipelineService implements IAnalysisPipeline {
  private readonly logger = new Logger(AnalysisPipelineService.name);

  constructor(
    private readonly traceLoader: TraceLoaderService,
    private readonly frameExtractor: FrameExtractorService,
    private readonly summarizer: SummarizerService,
    private readonly gateEvaluator: GateEvaluatorService,
    private readonly warningCollector: WarningCollectorService,
  ) {}

  run(raw: Buffer | string, options: AnalyzeOptions): AnalysisOutcome {
    // Config problems are reported before the trace is even parsed
    this.gateEvaluator.validateConfig(options.gate);

    const store = this.traceLoader.load(raw);
    const extraction = this.frameExtractor.extractFrameSamples(
      store,
      options.extraction,
    );
    this.logger.debug(
      `Extracted ${extraction.samples.length} sample(s) from ${extraction.boundaryCount} frame boundaries`,
    );

    const summary = this.summarizer.summarize(
      extraction.samples,
      options.gate.outlierTrimStrategy,
    );
    const verdict = this.gateEvaluator.evaluate(summary, options.gate);
    const warnings = this.warningCollector.collect(store, options.warnings);

    return {
      summary,
      verdict,
      extraction,
      warnings,
      diagnostics: { ...store.diagnostics },
    };
  }
}
