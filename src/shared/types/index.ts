/**
 * Shared types for fps-gate
 */

export * from './trace.types.js';
export * from './frame.types.js';
export * from './gate.types.js';
export * from './config.types.js';
