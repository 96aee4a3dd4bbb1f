/**
 * Exit code mapping and display helpers for fps-gate errors
 */

import { FpsGateError } from './error-types.js';

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof FpsGateError) {
    return error.exitCode;
  }
  return 1; // Unknown error
}

/**
 * Whether the error means the measurement pipeline is broken
 * (as opposed to the page failing the gate)
 */
export function isMeasurementError(error: unknown): boolean {
  if (!(error instanceof FpsGateError)) return false;
  return error.exitCode >= 30 && error.exitCode < 40;
}

/**
 * Pick the exit code for a batch of runs: the first measurement error wins,
 * then the first gate failure, then success.
 */
export function combineExitCodes(codes: readonly number[]): number {
  const measurement = codes.find((code) => code >= 30 && code < 40);
  if (measurement !== undefined) return measurement;
  const other = codes.find((code) => code !== 0);
  return other ?? 0;
}

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof FpsGateError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
