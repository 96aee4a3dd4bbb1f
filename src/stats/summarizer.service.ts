/**
 * Statistical Summarizer
 * Aggregates FPS samples into the statistics the quality gate tests
 *
 * All statistics use population formulas over the FPS values only;
 * sample timestamps never enter the arithmetic.
 */

import { Injectable } from '@nestjs/common';
import type {
  FpsSummary,
  FrameSample,
  TrimStrategy,
} from '../shared/types/index.js';
import {
  ConfigError,
  InsufficientDataError,
} from '../errors/error-types.js';

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function populationStandardDeviation(
  values: readonly number[],
  average: number,
): number {
  let squares = 0;
  for (const value of values) {
    const delta = value - average;
    squares += delta * delta;
  }
  return Math.sqrt(squares / values.length);
}

/**
 * Middle value of the sorted values; mean of the two middle values for an
 * even count
 */
export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? NaN;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[middle - 1] ?? NaN;
  return (lower + upper) / 2;
}

function assertTrimStrategy(strategy: TrimStrategy): void {
  if (
    strategy.kind === 'drop-first-n' &&
    !(Number.isInteger(strategy.n) && strategy.n >= 0)
  ) {
    throw new ConfigError([
      { field: 'trimStrategy.n', message: 'must be a non-negative integer' },
    ]);
  }
  if (
    strategy.kind === 'drop-beyond-std-dev' &&
    !(Number.isFinite(strategy.k) && strategy.k > 0)
  ) {
    throw new ConfigError([
      { field: 'trimStrategy.k', message: 'must be a positive number' },
    ]);
  }
}

@Injectable()
export class SummarizerService {
  /**
   * @throws ConfigError when `n` or `k` of the trim strategy is out of range
   * @throws InsufficientDataError when there are no samples, or trimming
   *   removes all of them
   */
  summarize(
    samples: readonly FrameSample[],
    trimStrategy: TrimStrategy,
  ): FpsSummary {
    assertTrimStrategy(trimStrategy);
    if (samples.length === 0) {
      throw new InsufficientDataError(0, 'no frame samples to summarize');
    }

    const values = samples.map((sample) => sample.instantaneousFps);
    let minValue = Infinity;
    let maxValue = -Infinity;
    for (const value of values) {
      if (value < minValue) minValue = value;
      if (value > maxValue) maxValue = value;
    }
    // Clamped: float summation can land just outside [min, max]
    const average = Math.min(Math.max(mean(values), minValue), maxValue);
    const standardDeviation = populationStandardDeviation(values, average);

    const trimmed = this.applyTrim(
      values,
      trimStrategy,
      average,
      standardDeviation,
    );
    if (trimmed.length === 0) {
      throw new InsufficientDataError(
        values.length,
        `trim strategy '${trimStrategy.kind}' removed every sample`,
      );
    }
    const trimmedMean =
      trimStrategy.kind === 'none'
        ? average
        : Math.min(Math.max(mean(trimmed), minValue), maxValue);

    return Object.freeze({
      mean: average,
      median: median(values),
      standardDeviation,
      trimmedMean,
      sampleCount: values.length,
      minValue,
      maxValue,
      trimmedSampleCount: trimmed.length,
      trimStrategy,
    });
  }

  private applyTrim(
    values: readonly number[],
    strategy: TrimStrategy,
    average: number,
    standardDeviation: number,
  ): number[] {
    switch (strategy.kind) {
      case 'none':
        return [...values];
      case 'drop-first-n':
        return values.slice(strategy.n);
      case 'drop-beyond-std-dev': {
        const limit = strategy.k * standardDeviation;
        return values.filter((value) => Math.abs(value - average) <= limit);
      }
    }
  }
}
