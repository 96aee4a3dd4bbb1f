/**
 * Reporter Service
 * Builds gate records and the sinks they are published to
 */

import { Injectable } from '@nestjs/common';
import * as path from 'path';
import { TerminalReporter } from './terminal.reporter.js';
import { JSONReporter } from './json.reporter.js';
import { JsonFileReportSink, TerminalReportSink } from './report-sinks.js';
import { StorageService } from '../services/storage.service.js';
import type { AnalysisOutcome } from '../analyzer/interfaces/index.js';
import type {
  GateReportRecord,
  ReportSink,
  TerminalReportOptions,
} from './interfaces/index.js';

@Injectable()
export class ReporterService {
  constructor(
    private readonly terminalReporter: TerminalReporter,
    private readonly jsonReporter: JSONReporter,
    private readonly storageService: StorageService,
  ) {}

  buildRecord(trace: string, outcome: AnalysisOutcome): GateReportRecord {
    return this.jsonReporter.buildRecord(trace, outcome);
  }

  createTerminalSink(options: TerminalReportOptions): ReportSink {
    return new TerminalReportSink(this.terminalReporter, options);
  }

  /**
   * JSON file sink; relative paths land in the reports directory
   */
  createJsonFileSink(
    outputPath: string,
    reportsDir: string,
  ): JsonFileReportSink {
    const finalPath = path.isAbsolute(outputPath)
      ? outputPath
      : path.join(reportsDir, outputPath);
    return new JsonFileReportSink(
      this.storageService,
      this.jsonReporter,
      finalPath,
    );
  }
}
