/**
 * Error types for fps-gate
 *
 * Exit Code Strategy:
 * | Code Range | Category | Examples |
 * |------------|----------|----------|
 * | 0 | Success | Quality gate passed |
 * | 1-9 | General errors | Unknown error, invalid arguments, invalid config |
 * | 30-39 | Trace errors | Parse failed, trace missing, not enough frames |
 * | 50-59 | CI failures | Quality gate failed |
 *
 * Trace errors mean the measurement itself is broken; CI failures mean the
 * page really got slower. The two ranges never overlap.
 */

export abstract class FpsGateError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;
  abstract readonly recoverable: boolean;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// General Errors (1-9)

export class InvalidArgumentError extends FpsGateError {
  readonly code = 'INVALID_ARGUMENT';
  readonly exitCode = 2;
  readonly recoverable = false;

  constructor(
    public readonly argument: string,
    public readonly reason: string,
  ) {
    super(`Invalid argument '${argument}': ${reason}`);
  }
}

export interface ConfigProblem {
  field: string;
  message: string;
}

export class ConfigError extends FpsGateError {
  readonly code = 'INVALID_CONFIG';
  readonly exitCode = 3;
  readonly recoverable = false;

  constructor(public readonly problems: ConfigProblem[]) {
    super(
      `Invalid gate configuration: ${problems
        .map((p) => `${p.field}: ${p.message}`)
        .join('; ')}`,
    );
  }
}

// Trace Errors (30-39)

export class TraceParseError extends FpsGateError {
  readonly code = 'TRACE_PARSE_FAILED';
  readonly exitCode = 30;
  readonly recoverable = false;

  constructor(
    public readonly reason: string,
    public readonly cause?: Error,
  ) {
    super(`Failed to parse trace: ${reason}`);
  }
}

export class TraceNotFoundError extends FpsGateError {
  readonly code = 'TRACE_NOT_FOUND';
  readonly exitCode = 31;
  readonly recoverable = false;

  constructor(public readonly tracePath: string) {
    super(`Trace file not found: ${tracePath}`);
  }
}

export class InsufficientDataError extends FpsGateError {
  readonly code = 'INSUFFICIENT_DATA';
  readonly exitCode = 33;
  readonly recoverable = false;

  constructor(
    public readonly availableSamples: number,
    reason: string,
  ) {
    super(`Insufficient frame data (${availableSamples} samples): ${reason}`);
  }
}

// CI Failures (50-59)

export class GateFailedError extends FpsGateError {
  readonly code = 'QUALITY_GATE_FAILED';
  readonly exitCode = 50;
  readonly recoverable = false;

  constructor(public readonly reasons: readonly string[]) {
    super(`Quality gate failed: ${reasons.join('; ')}`);
  }
}
