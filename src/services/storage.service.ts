import { Injectable } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import { gunzip } from 'zlib';
import * as yaml from 'js-yaml';
import {
  ConfigError,
  TraceNotFoundError,
  TraceParseError,
} from '../errors/error-types.js';
import type { Config } from '../shared/types/index.js';

const gunzipAsync = promisify(gunzip);

export interface StorageServiceOptions {
  baseDir?: string;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

@Injectable()
export class StorageService {
  private readonly baseDir: string;
  private readonly tracesDir: string;
  private readonly reportsDir: string;

  constructor(options: StorageServiceOptions = {}) {
    this.baseDir = options.baseDir ?? '.fps-gate';
    this.tracesDir = path.join(this.baseDir, 'traces');
    this.reportsDir = path.join(this.baseDir, 'reports');
  }

  /**
   * Ensure all required directories exist
   */
  async ensureDirectories(): Promise<void> {
    for (const dir of [this.baseDir, this.tracesDir, this.reportsDir]) {
      await fs.mkdir(dir, { recursive: true });
    }
  }

  /**
   * Read raw trace bytes; `.gz` files are decompressed
   * @throws TraceNotFoundError when the file does not exist
   * @throws TraceParseError when the gzip framing is corrupt
   */
  async readTrace(tracePath: string): Promise<Buffer> {
    let content: Buffer;
    try {
      content = await fs.readFile(tracePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new TraceNotFoundError(tracePath);
      }
      throw error;
    }
    if (!tracePath.endsWith('.gz')) return content;
    try {
      return await gunzipAsync(content);
    } catch (error) {
      throw new TraceParseError(
        'corrupt gzip framing',
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Write a file at an explicit location
   */
  async writeFile(filePath: string, content: string): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  /**
   * Read and parse a YAML configuration file. A missing default config is
   * null; a missing explicit path is an error.
   * @throws ConfigError when an explicit `configPath` does not exist
   */
  async readConfig(configPath?: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(configPath ?? this.getConfigPath(), 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      if (configPath === undefined) return null;
      throw new ConfigError([
        { field: '(file)', message: `config file not found: ${configPath}` },
      ]);
    }
    return yaml.load(content);
  }

  /**
   * Write configuration file
   */
  async writeConfig(config: Config): Promise<string> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const configPath = this.getConfigPath();
    const content = yaml.dump(config, { indent: 2, lineWidth: 120 });
    await fs.writeFile(configPath, content, 'utf-8');
    return configPath;
  }

  /**
   * Check if a file exists
   */
  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Find the most recently modified trace in the traces directory
   */
  async findLatestTrace(): Promise<string | null> {
    const entries = await fs
      .readdir(this.tracesDir, { withFileTypes: true })
      .catch((error: unknown) => {
        if (isMissingFile(error)) return null;
        throw error;
      });
    if (!entries) return null;

    const files = entries.filter(
      (e) =>
        e.isFile() && (e.name.endsWith('.json') || e.name.endsWith('.json.gz')),
    );
    const fileStats = await Promise.all(
      files.map(async (f) => {
        const filePath = path.join(this.tracesDir, f.name);
        const stat = await fs.stat(filePath);
        return { path: filePath, mtime: stat.mtime };
      }),
    );
    fileStats.sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
    return fileStats[0]?.path ?? null;
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  getTracesDir(): string {
    return this.tracesDir;
  }

  getReportsDir(): string {
    return this.reportsDir;
  }

  getConfigPath(): string {
    return path.join(this.baseDir, 'config.yaml');
  }
}
