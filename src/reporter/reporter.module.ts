import { Module } from '@nestjs/common';
import { ReporterService } from './reporter.service.js';
import { TerminalReporter } from './terminal.reporter.js';
import { JSONReporter } from './json.reporter.js';

@Module({
  providers: [ReporterService, TerminalReporter, JSONReporter],
  exports: [ReporterService, TerminalReporter, JSONReporter],
})
export class ReporterModule {}
