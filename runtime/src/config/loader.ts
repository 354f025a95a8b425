/**
 * Toolkit configuration loading.
 *
 * Resolution order for the file: explicit path, `TOOLBELT_CONFIG`, then
 * `./toolbelt.config.json` when it exists. Environment variables override the
 * file before validation.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ToolkitConfigError, toErrorMessage } from '../types/errors.js';
import { isRecord } from '../utils/type-guards.js';
import { parseToolkitConfig, type ToolkitConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'toolbelt.config.json';

export interface LoadConfigOptions {
  /** Explicit config file path; must exist */
  path?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched for the default file (default: process.cwd()) */
  cwd?: string;
}

// ============================================================================
// Path resolution
// ============================================================================

export function resolveConfigPath(options: LoadConfigOptions = {}): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  if (options.path) return resolve(cwd, options.path);
  if (env.TOOLBELT_CONFIG) return resolve(cwd, env.TOOLBELT_CONFIG);

  const candidate = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(candidate) ? candidate : undefined;
}

// ============================================================================
// Loading
// ============================================================================

async function readConfigFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ToolkitConfigError(`Failed to read config file at ${path}: ${toErrorMessage(err)}`);
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ToolkitConfigError(`Invalid JSON in config file ${path}`);
  }
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Overlay recognised environment variables onto raw file input.
 *
 * Non-object input is returned untouched so validation reports it.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;
  const merged: Record<string, unknown> = { ...raw };

  if (env.TOOLBELT_LOG_LEVEL) {
    merged.logLevel = env.TOOLBELT_LOG_LEVEL;
  }

  const chat = section(merged, 'chat');
  const apiKeys = section(chat, 'apiKeys');
  if (env.OPENAI_API_KEY) apiKeys.openai = env.OPENAI_API_KEY;
  if (env.ANTHROPIC_API_KEY) apiKeys.anthropic = env.ANTHROPIC_API_KEY;
  if (env.OLLAMA_HOST) chat.ollamaHost = env.OLLAMA_HOST;
  if (env.AWS_REGION) chat.region = env.AWS_REGION;
  if (Object.keys(apiKeys).length > 0) chat.apiKeys = apiKeys;
  if (Object.keys(chat).length > 0) merged.chat = chat;

  return merged;
}

/**
 * Load, merge and validate the toolkit configuration.
 *
 * @throws ToolkitConfigError on unreadable files, bad JSON or schema violations
 */
export async function loadToolkitConfig(options: LoadConfigOptions = {}): Promise<ToolkitConfig> {
  const env = options.env ?? process.env;
  const path = resolveConfigPath({ ...options, env });
  const raw = path ? await readConfigFile(path) : {};
  return parseToolkitConfig(applyEnvOverrides(raw, env));
}
