/**
 * Quality Gate Evaluator
 * Applies a minimum-FPS threshold to one statistic of an FpsSummary
 */

import { Injectable } from '@nestjs/common';
import type {
  FpsSummary,
  GateConfig,
  GateVerdict,
  StatisticName,
} from '../shared/types/index.js';
import { STATISTIC_NAMES } from '../shared/types/index.js';
import { ConfigError, type ConfigProblem } from '../errors/error-types.js';

const TRIM_KINDS = ['none', 'drop-first-n', 'drop-beyond-std-dev'];

function isStatisticName(value: unknown): value is StatisticName {
  return STATISTIC_NAMES.some((name) => name === value);
}

@Injectable()
export class GateEvaluatorService {
  /**
   * Reject an invalid config before any computation begins
   * @throws ConfigError listing every problem found
   */
  validateConfig(config: GateConfig): void {
    const problems: ConfigProblem[] = [];

    if (
      typeof config.minAcceptableFps !== 'number' ||
      !Number.isFinite(config.minAcceptableFps) ||
      config.minAcceptableFps < 0
    ) {
      problems.push({
        field: 'minAcceptableFps',
        message: 'must be a finite, non-negative number',
      });
    }

    if (!isStatisticName(config.statisticUnderTest)) {
      problems.push({
        field: 'statisticUnderTest',
        message: `must be one of: ${STATISTIC_NAMES.join(', ')}`,
      });
    }

    const trim = config.outlierTrimStrategy;
    if (!trim || !TRIM_KINDS.includes(trim.kind)) {
      problems.push({
        field: 'outlierTrimStrategy',
        message: `must be one of: ${TRIM_KINDS.join(', ')}`,
      });
    } else if (
      trim.kind === 'drop-first-n' &&
      !(Number.isInteger(trim.n) && trim.n >= 0)
    ) {
      problems.push({
        field: 'outlierTrimStrategy.n',
        message: 'must be a non-negative integer',
      });
    } else if (
      trim.kind === 'drop-beyond-std-dev' &&
      !(Number.isFinite(trim.k) && trim.k > 0)
    ) {
      problems.push({
        field: 'outlierTrimStrategy.k',
        message: 'must be a positive number',
      });
    }

    if (problems.length > 0) {
      throw new ConfigError(problems);
    }
  }

  /**
   * Evaluate a summary against the gate. Pure: same inputs, same verdict.
   */
  evaluate(summary: FpsSummary, config: GateConfig): GateVerdict {
    this.validateConfig(config);

    const statistic = config.statisticUnderTest;
    const observedValue = summary[statistic];
    const threshold = config.minAcceptableFps;
    const passed = observedValue >= threshold;

    const reasons: string[] = [];
    if (!passed) {
      reasons.push(
        `${statistic} ${observedValue.toFixed(1)} < threshold ${threshold.toFixed(1)} (${summary.sampleCount} samples)`,
      );
    }

    return Object.freeze({
      passed,
      observedValue,
      threshold,
      statisticUsed: statistic,
      reasons: Object.freeze(reasons),
    });
  }
}
