import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonFileReportSink, TerminalReportSink } from './report-sinks.js';
import { JSONReporter } from './json.reporter.js';
import { TerminalReporter } from './terminal.reporter.js';
import { StorageService } from '../services/storage.service.js';
import type { GateReportRecord } from './interfaces/index.js';

function makeRecord(trace: string, passed: boolean): GateReportRecord {
  return {
    trace,
    mean: 50,
    median: 50,
    standardDeviation: 0,
    trimmedMean: 50,
    sampleCount: 4,
    minValue: 50,
    maxValue: 50,
    trimmedSampleCount: 4,
    trimStrategy: 'none',
    passed,
    observedValue: 50,
    threshold: passed ? 30 : 55,
    statisticUsed: 'mean',
    reasons: passed ? [] : ['mean 50.0 < threshold 55.0 (4 samples)'],
    boundaryCount: 5,
    excludedIntervalCount: 0,
    warnings: [],
    generatedAt: '2026-03-01T12:00:00.000Z',
  };
}

describe('report sinks', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'fps-gate-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  describe('JsonFileReportSink', () => {
    it('should write every published record on close', async () => {
      const outputPath = path.join(tempDir, 'reports', 'gate.json');
      const sink = new JsonFileReportSink(
        new StorageService({ baseDir: tempDir }),
        new JSONReporter(),
        outputPath,
      );
      const records = [makeRecord('a.json', true), makeRecord('b.json', false)];

      for (const record of records) {
        await sink.publish(record);
      }
      expect(fs.existsSync(outputPath)).toBe(false);

      await sink.close();

      const written = await fs.promises.readFile(outputPath, 'utf-8');
      expect(JSON.parse(written)).toEqual(records);
    });
  });

  describe('TerminalReportSink', () => {
    it('should hand the rendered report to the writer', async () => {
      const write = jest.fn();
      const sink = new TerminalReportSink(
        new TerminalReporter(),
        { colorize: false },
        write,
      );

      await sink.publish(makeRecord('a.json', false));

      expect(write).toHaveBeenCalledTimes(1);
      expect(write.mock.calls[0]?.[0]).toContain(
        '● FAILED  mean 50.0 vs threshold 55.0',
      );
    });
  });
});
