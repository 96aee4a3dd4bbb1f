/**
 * Analyze Command
 * Runs the FPS quality gate over one or more trace files
 */

import { Command, CommandRunner, Option } from 'nest-commander';
import { Injectable } from '@nestjs/common';
import { AnalysisPipelineService } from '../analyzer/analysis-pipeline.service.js';
import { GateEvaluatorService } from '../gate/gate-evaluator.service.js';
import { ReporterService } from '../reporter/reporter.service.js';
import { StorageService } from '../services/storage.service.js';
import { ConfigService } from '../services/config.service.js';
import {
  GateFailedError,
  InvalidArgumentError,
} from '../errors/error-types.js';
import {
  combineExitCodes,
  formatError,
  getExitCode,
} from '../errors/exit-codes.js';
import { ICONS, logStep } from '../shared/utils/console-icons.js';
import { STATISTIC_NAMES } from '../shared/types/index.js';
import type {
  Config,
  FrameExtractionOptions,
  GateConfig,
  StatisticName,
  TrimStrategy,
} from '../shared/types/index.js';
import type { GateReportRecord } from '../reporter/interfaces/index.js';

export interface AnalyzeCommandOptions {
  minFps?: number;
  statistic?: StatisticName;
  trim?: TrimStrategy;
  frameMarker?: string[];
  process?: number;
  thread?: number;
  config?: string;
  json?: string;
  latest?: boolean;
  verbose?: boolean;
  /** `--no-color` sets this to false */
  color?: boolean;
}

type TraceRun =
  | { trace: string; record: GateReportRecord }
  | { trace: string; error: unknown };

@Injectable()
@Command({
  name: 'analyze',
  aliases: ['a'],
  description: 'Run the FPS quality gate over one or more trace files',
  arguments: '[trace-files...]',
})
export class AnalyzeCommand extends CommandRunner {
  constructor(
    private readonly pipeline: AnalysisPipelineService,
    private readonly gateEvaluator: GateEvaluatorService,
    private readonly reporterService: ReporterService,
    private readonly storageService: StorageService,
    private readonly configService: ConfigService,
  ) {
    super();
  }

  async run(
    passedParams: string[],
    options: AnalyzeCommandOptions,
  ): Promise<void> {
    const exitCode = await this.execute(passedParams, options);
    process.exit(exitCode);
  }

  /**
   * Analyze every trace and return the process exit code
   */
  async execute(
    traceFiles: string[],
    options: AnalyzeCommandOptions,
  ): Promise<number> {
    try {
      const traces = await this.resolveTraces(traceFiles, options);
      const config = await this.configService.loadConfig(options.config);
      const gate = this.configService.toGateConfig(config, {
        minAcceptableFps: options.minFps,
        statisticUnderTest: options.statistic,
        outlierTrimStrategy: options.trim,
      });
      const extraction = this.buildExtractionOptions(config, options);

      // Validated once up front so a bad gate fails before any trace is read
      this.gateEvaluator.validateConfig(gate);

      const runs = await Promise.all(
        traces.map((trace) =>
          this.analyzeTrace(trace, config, gate, extraction),
        ),
      );

      const exitCode = await this.publish(runs, config, options);
      this.printSummary(runs, exitCode);
      return exitCode;
    } catch (error) {
      console.error(`${ICONS.failure} ${formatError(error)}`);
      return getExitCode(error);
    }
  }

  private async resolveTraces(
    traceFiles: string[],
    options: AnalyzeCommandOptions,
  ): Promise<string[]> {
    if (traceFiles.length > 0 && !options.latest) {
      return traceFiles;
    }

    logStep('Searching for latest trace...');
    const latest = await this.storageService.findLatestTrace();
    if (!latest) {
      throw new InvalidArgumentError(
        'trace-files',
        `no trace files given and none found in ${this.storageService.getTracesDir()}`,
      );
    }
    logStep(`Found: ${latest}`);
    return [latest];
  }

  private buildExtractionOptions(
    config: Config,
    options: AnalyzeCommandOptions,
  ): FrameExtractionOptions {
    const processId = options.process ?? config.extraction.processId;
    const threadId = options.thread ?? config.extraction.threadId;
    const frameMarkers =
      options.frameMarker && options.frameMarker.length > 0
        ? options.frameMarker
        : config.extraction.frameMarkers;
    return { frameMarkers, processId, threadId };
  }

  private async analyzeTrace(
    trace: string,
    config: Config,
    gate: GateConfig,
    extraction: FrameExtractionOptions,
  ): Promise<TraceRun> {
    try {
      const raw = await this.storageService.readTrace(trace);
      const outcome = this.pipeline.run(raw, {
        gate,
        extraction,
        warnings: {
          longTaskThresholdMs: config.warnings.longTaskThresholdMs,
        },
      });
      const record = this.reporterService.buildRecord(trace, outcome);
      return { trace, record };
    } catch (error) {
      return { trace, error };
    }
  }

  /**
   * Send records to the sinks and work out the exit code, in argument order
   */
  private async publish(
    runs: TraceRun[],
    config: Config,
    options: AnalyzeCommandOptions,
  ): Promise<number> {
    const terminal = this.reporterService.createTerminalSink({
      colorize: options.color !== false,
      verbose: options.verbose ?? false,
    });
    const jsonSink = options.json
      ? this.reporterService.createJsonFileSink(
          options.json,
          config.output.reportsDir,
        )
      : undefined;

    const codes: number[] = [];
    for (const run of runs) {
      if ('record' in run) {
        await terminal.publish(run.record);
        await jsonSink?.publish(run.record);
        codes.push(
          run.record.passed
            ? 0
            : new GateFailedError(run.record.reasons).exitCode,
        );
      } else {
        console.error(
          `${ICONS.failure} ${run.trace}: ${formatError(run.error)}`,
        );
        codes.push(getExitCode(run.error));
      }
    }

    if (jsonSink) {
      await jsonSink.close();
      logStep(`JSON report written to: ${jsonSink.outputPath}`);
    }

    return combineExitCodes(codes);
  }

  private printSummary(runs: TraceRun[], exitCode: number): void {
    const passed = runs.filter((run) => 'record' in run && run.record.passed);
    if (exitCode === 0) {
      console.log(
        `\n${ICONS.success} Quality gate passed (${passed.length}/${runs.length} trace(s))\n`,
      );
    } else {
      console.log(
        `\n${ICONS.failure} Quality gate did not pass (${passed.length}/${runs.length} trace(s) passed, exit code ${exitCode})\n`,
      );
    }
  }

  @Option({
    flags: '-m, --min-fps <fps>',
    description: 'Minimum acceptable FPS (overrides config)',
  })
  parseMinFps(val: string): number {
    const fps = Number(val);
    if (!Number.isFinite(fps) || fps < 0) {
      throw new InvalidArgumentError(
        '--min-fps',
        `expected a non-negative number, got '${val}'`,
      );
    }
    return fps;
  }

  @Option({
    flags: '-s, --statistic <name>',
    description: `Statistic under test: ${STATISTIC_NAMES.join(', ')}`,
  })
  parseStatistic(val: string): StatisticName {
    const statistic = STATISTIC_NAMES.find((name) => name === val);
    if (!statistic) {
      throw new InvalidArgumentError(
        '--statistic',
        `expected one of ${STATISTIC_NAMES.join(', ')}, got '${val}'`,
      );
    }
    return statistic;
  }

  @Option({
    flags: '-t, --trim <strategy>',
    description: 'Outlier trim: none, first:<n> or stddev:<k>',
  })
  parseTrim(val: string): TrimStrategy {
    return this.configService.parseTrimStrategy(val);
  }

  @Option({
    flags: '--frame-marker <name>',
    description: 'Event name marking a frame boundary (repeatable)',
  })
  parseFrameMarker(val: string, previous: string[] = []): string[] {
    return [...previous, val];
  }

  @Option({
    flags: '--process <pid>',
    description: 'Only use frame markers from this process ID',
  })
  parseProcess(val: string): number {
    const pid = Number(val);
    if (!Number.isInteger(pid)) {
      throw new InvalidArgumentError(
        '--process',
        `expected an integer process ID, got '${val}'`,
      );
    }
    return pid;
  }

  @Option({
    flags: '--thread <tid>',
    description: 'Only use frame markers from this thread ID',
  })
  parseThread(val: string): number {
    const tid = Number(val);
    if (!Number.isInteger(tid)) {
      throw new InvalidArgumentError(
        '--thread',
        `expected an integer thread ID, got '${val}'`,
      );
    }
    return tid;
  }

  @Option({
    flags: '-c, --config <path>',
    description: 'Path to config.yaml (default: .fps-gate/config.yaml)',
  })
  parseConfig(val: string): string {
    return val;
  }

  @Option({
    flags: '-j, --json <path>',
    description: 'Write a JSON report; relative paths go to the reports dir',
  })
  parseJson(val: string): string {
    return val;
  }

  @Option({
    flags: '-l, --latest',
    description: 'Analyze the most recent trace in .fps-gate/traces',
  })
  parseLatest(): boolean {
    return true;
  }

  @Option({
    flags: '-v, --verbose',
    description: 'Show trace load and extraction diagnostics',
  })
  parseVerbose(): boolean {
    return true;
  }

  @Option({
    flags: '--no-color',
    description: 'Disable colored output',
  })
  parseColor(): boolean {
    return false;
  }
}
