/**
 * Console Icons Utility
 * Minimal icon set for terminal output: ✓ (pass), ● (fail/error), ⚠ (warning)
 */

export const ICONS = {
  success: '✓',
  failure: '●',
  warning: '⚠',
  step: '>',
};

export function logSuccess(message: string): void {
  console.log(`${ICONS.success} ${message}`);
}

export function logFailure(message: string): void {
  console.error(`${ICONS.failure} ${message}`);
}

export function logWarning(message: string): void {
  console.log(`${ICONS.warning} ${message}`);
}

/**
 * Log a progress step, e.g. "> Loading trace: ..."
 */
export function logStep(message: string): void {
  console.log(`${ICONS.step} ${message}`);
}
