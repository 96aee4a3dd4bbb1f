#!/usr/bin/env node
/**
 * fps-gate CLI Entry Point
 *
 * Usage:
 *   fps-gate init [--force]
 *   fps-gate analyze <trace.json...> [--min-fps 30] [--trim first:1]
 *   fps-gate analyze --latest --json gate.json
 *   fps-gate config show
 *   fps-gate config validate [--file <path>]
 *
 * Exit Codes:
 *   0: Gate passed
 *   1: Unknown error
 *   2: Invalid argument
 *   3: Invalid configuration
 *   30-39: Trace measurement errors (parse, not found, insufficient data)
 *   50: Quality gate failed
 */

import 'reflect-metadata';
import { CommandFactory } from 'nest-commander';
import { AppModule } from './app.module.js';
import { formatError, getExitCode } from './errors/exit-codes.js';

async function bootstrap(): Promise<void> {
  await CommandFactory.run(AppModule, ['warn', 'error']);
}

bootstrap().catch((error: unknown) => {
  console.error(`Error: ${formatError(error)}`);
  process.exit(getExitCode(error));
});
