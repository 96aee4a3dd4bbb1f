/**
 * Report sinks shipped with the CLI
 */

import type { StorageService } from '../services/storage.service.js';
import type { JSONReporter } from './json.reporter.js';
import type { TerminalReporter } from './terminal.reporter.js';
import type {
  GateReportRecord,
  ReportSink,
  TerminalReportOptions,
} from './interfaces/index.js';

/**
 * Collects every record of a run and writes them as one JSON array on close
 */
export class JsonFileReportSink implements ReportSink {
  private readonly records: GateReportRecord[] = [];

  constructor(
    private readonly storageService: StorageService,
    private readonly jsonReporter: JSONReporter,
    readonly outputPath: string,
  ) {}

  publish(record: GateReportRecord): Promise<void> {
    this.records.push(record);
    return Promise.resolve();
  }

  async close(): Promise<void> {
    await this.storageService.writeFile(
      this.outputPath,
      this.jsonReporter.generate(this.records),
    );
  }
}

/**
 * Renders each record with the terminal reporter
 */
export class TerminalReportSink implements ReportSink {
  constructor(
    private readonly terminalReporter: TerminalReporter,
    private readonly options: TerminalReportOptions,
    private readonly write: (text: string) => void = (text) =>
      console.log(text),
  ) {}

  publish(record: GateReportRecord): Promise<void> {
    this.write(this.terminalReporter.generate(record, this.options));
    return Promise.resolve();
  }
}
