import { Module } from '@nestjs/common';
import { AnalysisPipelineService } from './analysis-pipeline.service.js';
import { WarningCollectorService } from './warning-collector.service.js';
import { TraceLoaderService } from '../trace/trace-loader.service.js';
import { FrameExtractorService } from '../frames/frame-extractor.service.js';
import { SummarizerService } from '../stats/summarizer.service.js';
import { GateEvaluatorService } from '../gate/gate-evaluator.service.js';

@Module({
  providers: [
    AnalysisPipelineService,
    WarningCollectorService,
    TraceLoaderService,
    FrameExtractorService,
    SummarizerService,
    GateEvaluatorService,
  ],
  exports: [
    AnalysisPipelineService,
    TraceLoaderService,
    FrameExtractorService,
    SummarizerService,
    GateEvaluatorService,
  ],
})
export class AnalyzerModule {}
