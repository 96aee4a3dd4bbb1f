import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { gzipSync } from 'zlib';
import { StorageService } from './storage.service.js';
import {
  ConfigError,
  TraceNotFoundError,
  TraceParseError,
} from '../errors/error-types.js';

describe('StorageService', () => {
  let service: StorageService;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'fps-gate-'));
    service = new StorageService({ baseDir: path.join(tempDir, '.fps-gate') });
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should lay out the workspace under the base directory', async () => {
    await service.ensureDirectories();

    expect(service.getConfigPath()).toBe(
      path.join(tempDir, '.fps-gate', 'config.yaml'),
    );
    expect(fs.existsSync(service.getTracesDir())).toBe(true);
    expect(fs.existsSync(service.getReportsDir())).toBe(true);
  });

  describe('readTrace', () => {
    it('should read plain and gzipped traces', async () => {
      const plain = path.join(tempDir, 'trace.json');
      const zipped = path.join(tempDir, 'trace.json.gz');
      await fs.promises.writeFile(plain, '{"traceEvents": []}');
      await fs.promises.writeFile(zipped, gzipSync('{"traceEvents": [1]}'));

      expect((await service.readTrace(plain)).toString()).toBe(
        '{"traceEvents": []}',
      );
      expect((await service.readTrace(zipped)).toString()).toBe(
        '{"traceEvents": [1]}',
      );
    });

    it('should throw TraceNotFoundError for a missing file', async () => {
      await expect(
        service.readTrace(path.join(tempDir, 'nope.json')),
      ).rejects.toBeInstanceOf(TraceNotFoundError);
    });

    it('should throw TraceParseError for corrupt gzip framing', async () => {
      const broken = path.join(tempDir, 'broken.json.gz');
      await fs.promises.writeFile(broken, 'not gzip data');

      const error: unknown = await service
        .readTrace(broken)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TraceParseError);
      expect(error).toHaveProperty(
        'message',
        'Failed to parse trace: corrupt gzip framing',
      );
    });

    it('should reject a truncated gzip stream', async () => {
      const truncated = path.join(tempDir, 'truncated.json.gz');
      const zipped = gzipSync('{"traceEvents": []}');
      await fs.promises.writeFile(truncated, zipped.subarray(0, 12));

      await expect(service.readTrace(truncated)).rejects.toBeInstanceOf(
        TraceParseError,
      );
    });
  });

  describe('readConfig', () => {
    it('should return null when there is no config file', async () => {
      await expect(service.readConfig()).resolves.toBeNull();
    });

    it('should throw ConfigError when an explicit path does not exist', async () => {
      const file = path.join(tempDir, 'typo.yaml');

      await expect(service.readConfig(file)).rejects.toThrow(
        `Invalid gate configuration: (file): config file not found: ${file}`,
      );
      await expect(service.readConfig(file)).rejects.toBeInstanceOf(
        ConfigError,
      );
    });

    it('should parse YAML', async () => {
      const file = path.join(tempDir, 'config.yaml');
      await fs.promises.writeFile(file, 'gate:\n  minAcceptableFps: 24\n');

      await expect(service.readConfig(file)).resolves.toEqual({
        gate: { minAcceptableFps: 24 },
      });
    });
  });

  describe('writeFile', () => {
    it('should create missing parent directories', async () => {
      const file = path.join(tempDir, 'a', 'b', 'report.json');

      await expect(service.writeFile(file, '[]')).resolves.toBe(file);
      expect(fs.readFileSync(file, 'utf-8')).toBe('[]');
    });
  });

  describe('findLatestTrace', () => {
    it('should return null without a traces directory', async () => {
      await expect(service.findLatestTrace()).resolves.toBeNull();
    });

    it('should pick the most recently modified trace', async () => {
      await service.ensureDirectories();
      const older = path.join(service.getTracesDir(), 'older.json');
      const newer = path.join(service.getTracesDir(), 'newer.json.gz');
      const notes = path.join(service.getTracesDir(), 'notes.txt');
      await fs.promises.writeFile(older, '[]');
      await fs.promises.writeFile(newer, gzipSync('[]'));
      await fs.promises.writeFile(notes, 'ignored');
      await fs.promises.utimes(older, new Date(1_000_000), new Date(1_000_000));
      await fs.promises.utimes(newer, new Date(2_000_000), new Date(2_000_000));
      await fs.promises.utimes(notes, new Date(3_000_000), new Date(3_000_000));

      await expect(service.findLatestTrace()).resolves.toBe(newer);
    });
  });
});
