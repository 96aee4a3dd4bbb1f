import { Injectable } from '@nestjs/common';
import * as yaml from 'js-yaml';
import { StorageService } from './storage.service.js';
import {
  ConfigError,
  InvalidArgumentError,
} from '../errors/error-types.js';
import { STATISTIC_NAMES } from '../shared/types/index.js';
import type {
  Config,
  GateConfig,
  OutlierTrimConfig,
  StatisticName,
  TrimStrategy,
  TrimStrategyKind,
} from '../shared/types/index.js';

export interface ConfigValidationError {
  field: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  /** Normalized config, defaults filled in; present when valid */
  config?: Config;
}

/**
 * Command-line values that take precedence over the config file
 */
export interface GateOverrides {
  minAcceptableFps?: number;
  statisticUnderTest?: StatisticName;
  outlierTrimStrategy?: TrimStrategy;
}

const TRIM_KINDS: readonly TrimStrategyKind[] = [
  'none',
  'drop-first-n',
  'drop-beyond-std-dev',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStatisticName(value: unknown): value is StatisticName {
  return STATISTIC_NAMES.some((name) => name === value);
}

function isTrimKind(value: unknown): value is TrimStrategyKind {
  return TRIM_KINDS.some((kind) => kind === value);
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

@Injectable()
export class ConfigService {
  constructor(private readonly storageService: StorageService) {}

  /**
   * Generate default configuration
   */
  getDefaultConfig(): Config {
    return {
      version: '1.0',
      gate: {
        minAcceptableFps: 30,
        statisticUnderTest: 'trimmedMean',
        outlierTrim: { strategy: 'drop-first-n', n: 1 },
      },
      extraction: {
        frameMarkers: ['DrawFrame'],
      },
      warnings: {
        longTaskThresholdMs: 50,
      },
      output: {
        reportsDir: '.fps-gate/reports',
      },
    };
  }

  /**
   * Load configuration; defaults when the file does not exist
   * @throws ConfigError when the file exists but is invalid
   */
  async loadConfig(configPath?: string): Promise<Config> {
    const raw = await this.readRawConfig(configPath);
    const result = this.validateConfig(raw);
    if (!result.config) {
      throw new ConfigError(result.errors);
    }
    return result.config;
  }

  /**
   * Read the config document without validating it; null when missing
   * @throws ConfigError when the file is not valid YAML
   */
  async readRawConfig(configPath?: string): Promise<unknown> {
    try {
      return await this.storageService.readConfig(configPath);
    } catch (error) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError([{ field: '(root)', message: error.message }]);
      }
      throw error;
    }
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: Config): Promise<string> {
    return this.storageService.writeConfig(config);
  }

  /**
   * Validate a parsed config document. Missing sections and fields take
   * their default values; present ones must be well typed.
   */
  validateConfig(raw: unknown): ConfigValidationResult {
    const defaults = this.getDefaultConfig();
    const errors: ConfigValidationError[] = [];

    if (raw === null || raw === undefined) {
      return { valid: true, errors, config: defaults };
    }
    if (!isRecord(raw)) {
      errors.push({
        field: '(root)',
        message: 'Configuration must be a mapping',
      });
      return { valid: false, errors };
    }

    let version = defaults.version;
    const rawVersion = raw['version'];
    // An unquoted YAML 1.0 arrives as a number
    if (typeof rawVersion === 'string' || typeof rawVersion === 'number') {
      version = String(rawVersion);
    } else if (rawVersion !== undefined) {
      errors.push({ field: 'version', message: 'Version must be a string' });
    }

    const gate = this.section(raw, 'gate', errors);
    const extraction = this.section(raw, 'extraction', errors);
    const warnings = this.section(raw, 'warnings', errors);
    const output = this.section(raw, 'output', errors);

    let minAcceptableFps = defaults.gate.minAcceptableFps;
    const minFps = gate['minAcceptableFps'];
    if (minFps !== undefined) {
      if (isNonNegativeNumber(minFps)) {
        minAcceptableFps = minFps;
      } else {
        errors.push({
          field: 'gate.minAcceptableFps',
          message: 'Minimum FPS must be a non-negative number',
        });
      }
    }

    let statisticUnderTest = defaults.gate.statisticUnderTest;
    const statistic = gate['statisticUnderTest'];
    if (statistic !== undefined) {
      if (isStatisticName(statistic)) {
        statisticUnderTest = statistic;
      } else {
        errors.push({
          field: 'gate.statisticUnderTest',
          message: `Statistic must be one of: ${STATISTIC_NAMES.join(', ')}`,
        });
      }
    }

    const trim = gate['outlierTrim'];
    const outlierTrim =
      trim === undefined
        ? defaults.gate.outlierTrim
        : this.validateOutlierTrim(trim, errors);

    let frameMarkers = defaults.extraction.frameMarkers;
    const markers = extraction['frameMarkers'];
    if (markers !== undefined) {
      if (
        Array.isArray(markers) &&
        markers.length > 0 &&
        markers.every((m) => typeof m === 'string' && m.length > 0)
      ) {
        frameMarkers = markers.map(String);
      } else {
        errors.push({
          field: 'extraction.frameMarkers',
          message: 'At least one frame marker event name is required',
        });
      }
    }

    let processId: number | undefined;
    const pid = extraction['processId'];
    if (pid !== undefined && pid !== null) {
      if (typeof pid === 'number' && Number.isInteger(pid)) {
        processId = pid;
      } else {
        errors.push({
          field: 'extraction.processId',
          message: 'Process ID must be an integer',
        });
      }
    }

    let threadId: number | undefined;
    const tid = extraction['threadId'];
    if (tid !== undefined && tid !== null) {
      if (typeof tid === 'number' && Number.isInteger(tid)) {
        threadId = tid;
      } else {
        errors.push({
          field: 'extraction.threadId',
          message: 'Thread ID must be an integer',
        });
      }
    }

    let longTaskThresholdMs = defaults.warnings.longTaskThresholdMs;
    const longTask = warnings['longTaskThresholdMs'];
    if (longTask !== undefined) {
      if (isNonNegativeNumber(longTask) && longTask > 0) {
        longTaskThresholdMs = longTask;
      } else {
        errors.push({
          field: 'warnings.longTaskThresholdMs',
          message: 'Long task threshold must be a positive number',
        });
      }
    }

    let reportsDir = defaults.output.reportsDir;
    const dir = output['reportsDir'];
    if (dir !== undefined) {
      if (typeof dir === 'string' && dir.length > 0) {
        reportsDir = dir;
      } else {
        errors.push({
          field: 'output.reportsDir',
          message: 'Reports directory is required',
        });
      }
    }

    if (errors.length > 0 || !outlierTrim) {
      return { valid: false, errors };
    }

    return {
      valid: true,
      errors,
      config: {
        version,
        gate: { minAcceptableFps, statisticUnderTest, outlierTrim },
        extraction: {
          frameMarkers,
          ...(processId === undefined ? {} : { processId }),
          ...(threadId === undefined ? {} : { threadId }),
        },
        warnings: { longTaskThresholdMs },
        output: { reportsDir },
      },
    };
  }

  /**
   * Build the GateConfig for a run: CLI overrides beat the config file
   */
  toGateConfig(config: Config, overrides: GateOverrides = {}): GateConfig {
    return {
      minAcceptableFps:
        overrides.minAcceptableFps ?? config.gate.minAcceptableFps,
      statisticUnderTest:
        overrides.statisticUnderTest ?? config.gate.statisticUnderTest,
      outlierTrimStrategy:
        overrides.outlierTrimStrategy ??
        this.toTrimStrategy(config.gate.outlierTrim),
    };
  }

  toTrimStrategy(trim: OutlierTrimConfig): TrimStrategy {
    switch (trim.strategy) {
      case 'none':
        return { kind: 'none' };
      case 'drop-first-n':
        return { kind: 'drop-first-n', n: trim.n ?? 0 };
      case 'drop-beyond-std-dev':
        return { kind: 'drop-beyond-std-dev', k: trim.k ?? 0 };
    }
  }

  /**
   * Parse the `--trim` flag: `none`, `first:<n>` or `stddev:<k>`
   * @throws InvalidArgumentError for anything else
   */
  parseTrimStrategy(value: string): TrimStrategy {
    const [kind, amount] = value.split(':', 2);
    if (kind === 'none' && amount === undefined) {
      return { kind: 'none' };
    }

    const parsed = Number(amount);
    if (kind === 'first' && Number.isInteger(parsed) && parsed >= 0) {
      return { kind: 'drop-first-n', n: parsed };
    }
    if (kind === 'stddev' && Number.isFinite(parsed) && parsed > 0) {
      return { kind: 'drop-beyond-std-dev', k: parsed };
    }

    throw new InvalidArgumentError(
      '--trim',
      `expected none, first:<n> or stddev:<k>, got '${value}'`,
    );
  }

  private section(
    raw: Record<string, unknown>,
    name: string,
    errors: ConfigValidationError[],
  ): Record<string, unknown> {
    const value = raw[name];
    if (value === undefined || value === null) return {};
    if (isRecord(value)) return value;
    errors.push({ field: name, message: `${name} must be a mapping` });
    return {};
  }

  private validateOutlierTrim(
    value: unknown,
    errors: ConfigValidationError[],
  ): OutlierTrimConfig | undefined {
    if (!isRecord(value) || !isTrimKind(value['strategy'])) {
      errors.push({
        field: 'gate.outlierTrim.strategy',
        message: `Strategy must be one of: ${TRIM_KINDS.join(', ')}`,
      });
      return undefined;
    }

    const strategy = value['strategy'];
    if (strategy === 'drop-first-n') {
      const n = value['n'];
      if (typeof n === 'number' && Number.isInteger(n) && n >= 0) {
        return { strategy, n };
      }
      errors.push({
        field: 'gate.outlierTrim.n',
        message: 'n must be a non-negative integer',
      });
      return undefined;
    }

    if (strategy === 'drop-beyond-std-dev') {
      const k = value['k'];
      if (isNonNegativeNumber(k) && k > 0) {
        return { strategy, k };
      }
      errors.push({
        field: 'gate.outlierTrim.k',
        message: 'k must be a positive number',
      });
      return undefined;
    }

    return { strategy };
  }
}
