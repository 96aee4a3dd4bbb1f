/**
 * Terminal Reporter
 * Generates human-friendly terminal output for one gate record
 */

import { Injectable } from '@nestjs/common';
import { ICONS } from '../shared/utils/console-icons.js';
import type {
  GateReportRecord,
  TerminalReportOptions,
} from './interfaces/index.js';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

type Palette = typeof COLORS;

const NO_COLORS: Palette = {
  reset: '',
  bold: '',
  red: '',
  green: '',
  yellow: '',
  cyan: '',
};

const RULE = '═'.repeat(63);

@Injectable()
export class TerminalReporter {
  /**
   * Generate terminal report for one trace
   */
  generate(
    record: GateReportRecord,
    options: TerminalReportOptions = {},
  ): string {
    const { colorize = true, verbose = false } = options;
    const c = colorize ? COLORS : NO_COLORS;
    const lines: string[] = [];

    lines.push(this.generateHeader(record, c));
    lines.push('');
    lines.push(this.generateFrameRate(record, c));
    lines.push('');

    if (verbose) {
      lines.push(this.generateDiagnostics(record, c));
      lines.push('');
    }

    if (record.warnings.length > 0) {
      lines.push(this.generateWarnings(record, c));
      lines.push('');
    }

    lines.push(this.generateVerdict(record, c));
    lines.push('');

    return lines.join('\n');
  }

  private generateHeader(record: GateReportRecord, c: Palette): string {
    return [
      `${c.bold}${RULE}${c.reset}`,
      `${c.bold}  FPS Quality Gate Report${c.reset}`,
      `${c.bold}${RULE}${c.reset}`,
      '',
      `  ${c.cyan}Trace:${c.reset}    ${record.trace}`,
      `  ${c.cyan}Samples:${c.reset}  ${record.sampleCount} (${record.trimmedSampleCount} after trim ${record.trimStrategy})`,
    ].join('\n');
  }

  private generateFrameRate(record: GateReportRecord, c: Palette): string {
    const rows: Array<[string, string]> = [
      ['Mean', this.formatFps(record.mean)],
      ['Median', this.formatFps(record.median)],
      ['Std Deviation', this.formatFps(record.standardDeviation)],
      ['Trimmed Mean', this.formatFps(record.trimmedMean)],
      [
        'Min / Max',
        `${record.minValue.toFixed(1)} / ${record.maxValue.toFixed(1)} fps`,
      ],
    ];

    const lines = [`${c.bold}Frame Rate${c.reset}`, '─'.repeat(50)];
    for (const [label, value] of rows) {
      lines.push(`  ${`${label}:`.padEnd(16)} ${value}`);
    }
    return lines.join('\n');
  }

  private generateDiagnostics(record: GateReportRecord, c: Palette): string {
    return [
      `${c.bold}Diagnostics${c.reset}`,
      '─'.repeat(50),
      `  ${'Boundaries:'.padEnd(16)} ${record.boundaryCount}`,
      `  ${'Excluded:'.padEnd(16)} ${record.excludedIntervalCount} interval(s)`,
    ].join('\n');
  }

  private generateWarnings(record: GateReportRecord, c: Palette): string {
    const lines = [`${c.bold}Warnings${c.reset}`, '─'.repeat(50)];
    for (const warning of record.warnings) {
      lines.push(`  ${c.yellow}${ICONS.warning}${c.reset} ${warning.message}`);
    }
    return lines.join('\n');
  }

  private generateVerdict(record: GateReportRecord, c: Palette): string {
    const comparison = `${record.statisticUsed} ${record.observedValue.toFixed(1)} vs threshold ${record.threshold.toFixed(1)}`;

    if (record.passed) {
      return `${c.green}${ICONS.success} PASSED${c.reset}  ${comparison}`;
    }

    const lines = [`${c.red}${ICONS.failure} FAILED${c.reset}  ${comparison}`];
    for (const reason of record.reasons) {
      lines.push(`  - ${reason}`);
    }
    return lines.join('\n');
  }

  private formatFps(value: number): string {
    return `${value.toFixed(1)} fps`;
  }
}
