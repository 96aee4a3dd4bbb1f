import { TerminalReporter } from './terminal.reporter.js';
import type { GateReportRecord } from './interfaces/index.js';

function makeRecord(
  overrides: Partial<GateReportRecord> = {},
): GateReportRecord {
  return {
    trace: 'traces/scroll.json',
    mean: 43.3333,
    median: 60,
    standardDeviation: 23.5702,
    trimmedMean: 35,
    sampleCount: 3,
    minValue: 10,
    maxValue: 60,
    trimmedSampleCount: 2,
    trimStrategy: 'drop-first-n(1)',
    passed: true,
    observedValue: 35,
    threshold: 30,
    statisticUsed: 'trimmedMean',
    reasons: [],
    boundaryCount: 4,
    excludedIntervalCount: 0,
    warnings: [],
    generatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('TerminalReporter', () => {
  const reporter = new TerminalReporter();

  it('should render a passing report', () => {
    const output = reporter.generate(makeRecord(), { colorize: false });

    expect(output.split('\n')).toEqual([
      '═══════════════════════════════════════════════════════════════',
      '  FPS Quality Gate Report',
      '═══════════════════════════════════════════════════════════════',
      '',
      '  Trace:    traces/scroll.json',
      '  Samples:  3 (2 after trim drop-first-n(1))',
      '',
      'Frame Rate',
      '──────────────────────────────────────────────────',
      '  Mean:            43.3 fps',
      '  Median:          60.0 fps',
      '  Std Deviation:   23.6 fps',
      '  Trimmed Mean:    35.0 fps',
      '  Min / Max:       10.0 / 60.0 fps',
      '',
      '✓ PASSED  trimmedMean 35.0 vs threshold 30.0',
      '',
    ]);
  });

  it('should render diagnostics, warnings and failure reasons', () => {
    const record = makeRecord({
      sampleCount: 12,
      trimmedSampleCount: 11,
      trimmedMean: 22,
      passed: false,
      observedValue: 22,
      reasons: ['trimmedMean 22.0 < threshold 30.0 (12 samples)'],
      boundaryCount: 13,
      excludedIntervalCount: 1,
      warnings: [
        {
          code: 'LONG_TASKS',
          message: '3 script task(s) ran for 50ms or longer',
          count: 3,
        },
      ],
    });

    const lines = reporter
      .generate(record, { colorize: false, verbose: true })
      .split('\n');

    expect(lines[5]).toBe('  Samples:  12 (11 after trim drop-first-n(1))');
    expect(lines.slice(15)).toEqual([
      'Diagnostics',
      '──────────────────────────────────────────────────',
      '  Boundaries:      13',
      '  Excluded:        1 interval(s)',
      '',
      'Warnings',
      '──────────────────────────────────────────────────',
      '  ⚠ 3 script task(s) ran for 50ms or longer',
      '',
      '● FAILED  trimmedMean 22.0 vs threshold 30.0',
      '  - trimmedMean 22.0 < threshold 30.0 (12 samples)',
      '',
    ]);
  });

  it('should colour the verdict by default', () => {
    const output = reporter.generate(makeRecord());

    expect(output).toContain('\x1b[32m✓ PASSED\x1b[0m');
    expect(output).toContain('\x1b[1m  FPS Quality Gate Report\x1b[0m');
  });
});
