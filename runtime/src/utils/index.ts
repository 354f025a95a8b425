/**
 * Utility exports for @toolbelt/runtime
 * @module
 */

export { createLogger, isLogLevel, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogSink } from './logger.js';

export { runCommand, buildEnv, TIMEOUT_EXIT_CODE } from './process.js';
export type { CommandRunner, RunCommandOptions, RunCommandResult } from './process.js';
export { ShellSession } from './shell-session.js';
export type { ShellRunResult, ShellSessionOptions } from './shell-session.js';

export { ensureLazyModule, canImport } from './lazy-import.js';
export { hasExecutable } from './which.js';
export { isRecord, isStringArray, hasKey } from './type-guards.js';
