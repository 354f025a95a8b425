/**
 * Action dispatch and parameter coercion shared by every adapter.
 *
 * Parameters arrive as a loose record: the bridge passes typed values, while
 * CLI flags and some MCP clients pass strings. The readers below accept both.
 *
 * @module
 */

import type { ToolParams, ToolResult } from './types.js';
import { errorResult } from './types.js';
import { ToolErrorCodes, toErrorMessage } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import { hasKey } from '../utils/type-guards.js';

export type ActionHandler = (params: ToolParams) => Promise<ToolResult>;

/**
 * Route `action` to its handler.
 *
 * Unknown actions and thrown errors both come back as failed results, so
 * nothing escapes the adapter boundary.
 *
 * @param label - Prefix for unexpected failures (e.g. "Planning" gives "Planning tool error: ...")
 */
export async function dispatchAction(
  label: string,
  handlers: Readonly<Record<string, ActionHandler>>,
  action: string,
  params: ToolParams,
  logger: Logger,
): Promise<ToolResult> {
  if (!hasKey(handlers, action)) {
    return unknownAction(action, Object.keys(handlers));
  }
  try {
    return await handlers[action](params);
  } catch (err) {
    const message = toErrorMessage(err);
    logger.error(`${label} tool error: ${message}`);
    return errorResult(`${label} tool error: ${message}`);
  }
}

export function unknownAction(action: string, available: readonly string[]): ToolResult {
  return errorResult(
    `Unknown action: ${action}. Available actions: ${available.join(', ')}`,
    ToolErrorCodes.INVALID_ACTION,
  );
}

export function missingParameter(message: string): ToolResult {
  return errorResult(message, ToolErrorCodes.MISSING_PARAMETER);
}

export function invalidParameter(message: string): ToolResult {
  return errorResult(message, ToolErrorCodes.INVALID_PARAMETER);
}

// ============================================================================
// Parameter readers
// ============================================================================

export function stringParam(params: ToolParams, name: string): string | undefined {
  const value = params[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/** Like {@link stringParam} but treats the empty string as absent. */
export function nonEmptyParam(params: ToolParams, name: string): string | undefined {
  const value = stringParam(params, name);
  return value === undefined || value === '' ? undefined : value;
}

export function numberParam(params: ToolParams, name: string): number | undefined {
  const value = params[name];
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function intParam(params: ToolParams, name: string): number | undefined {
  const value = numberParam(params, name);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
}

export function boolParam(params: ToolParams, name: string): boolean | undefined {
  const value = params[name];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const lowered = value.toLowerCase();
    if (lowered === 'true' || lowered === '1') return true;
    if (lowered === 'false' || lowered === '0') return false;
  }
  return undefined;
}

/**
 * Read a list of numbers given as an array, a JSON array string, or a
 * comma-separated string.
 */
export function numberListParam(params: ToolParams, name: string): number[] | undefined {
  const value = params[name];
  let items: unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    items = value.replace(/^\s*\[|\]\s*$/g, '').split(',');
  } else {
    return undefined;
  }
  const numbers = items.map((item) => (typeof item === 'number' ? item : Number(String(item).trim())));
  return numbers.every((n) => Number.isInteger(n)) ? numbers : undefined;
}

/** Split a comma-separated string (or string array) into trimmed entries. */
export function listParam(params: ToolParams, name: string): string[] | undefined {
  const value = params[name];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string').map((item) => item.trim()).filter(Boolean);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value.split(',').map((item) => item.trim()).filter(Boolean);
  }
  return undefined;
}
