import type { ToolCatalog } from '../tools/catalog.js';

export interface ParsedArgv {
  positional: string[];
  flags: Record<string, string | number | boolean>;
}

export type CliStatusCode = 0 | 1 | 2;

export interface CliRunOptions {
  argv?: string[];
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Environment for config overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Pre-built catalog; skips config loading and feature probes */
  catalog?: ToolCatalog;
}

export type CliCommand = 'list' | 'collection' | 'info' | 'run' | 'help';

export interface CliRuntimeContext {
  output: (text: string) => void;
  error: (text: string) => void;
}
