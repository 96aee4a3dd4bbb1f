import { Module } from '@nestjs/common';
import { InitCommand } from './init.command.js';
import { AnalyzeCommand } from './analyze.command.js';
import {
  ConfigCommand,
  ConfigShowCommand,
  ConfigValidateCommand,
} from './config.command.js';
import { AnalyzerModule } from '../analyzer/analyzer.module.js';
import { ReporterModule } from '../reporter/reporter.module.js';

@Module({
  imports: [AnalyzerModule, ReporterModule],
  providers: [
    InitCommand,
    AnalyzeCommand,
    ConfigCommand,
    ConfigShowCommand,
    ConfigValidateCommand,
  ],
})
export class CommandsModule {}
