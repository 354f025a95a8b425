/**
 * Core tool system types for @toolbelt/runtime
 *
 * Every adapter answers with a {@link ToolResult}. Hosts only ever see the
 * three envelope fields; `metadata` stays on this side of the boundary.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import type { ToolkitConfig } from '../config/schema.js';
import type { ToolErrorCode } from '../types/errors.js';
import { ToolErrorCodes } from '../types/errors.js';

/**
 * JSON Schema type alias.
 * Matches LLMTool.function.parameters exactly.
 */
export type JSONSchema = Record<string, unknown>;

export type ToolCategory =
  | 'execution'
  | 'files'
  | 'web'
  | 'browser'
  | 'macos'
  | 'vnc'
  | 'ai'
  | 'planning';

export const TOOL_CATEGORIES: readonly ToolCategory[] = [
  'execution',
  'files',
  'web',
  'browser',
  'macos',
  'vnc',
  'ai',
  'planning',
];

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

export type ParameterDefault = string | number | boolean;

/**
 * One entry of an adapter's ordered parameter list.
 */
export interface ParameterSpec {
  readonly name: string;
  readonly type: ParameterType;
  readonly description: string;
  readonly required: boolean;
  readonly default?: ParameterDefault;
  readonly enum?: readonly string[];
}

/** Loose keyword arguments; CLI and MCP callers supply strings. */
export type ToolParams = Readonly<Record<string, unknown>>;

export interface ToolResultMetadata {
  /** Condition code for failures and partial successes */
  code?: ToolErrorCode;
  /** Large payloads kept out of `output` (e.g. full screenshot base64) */
  artifacts?: Record<string, unknown>;
}

/**
 * Result returned by every tool invocation.
 */
export interface ToolResult {
  readonly success: boolean;
  /** Payload when `success` is true */
  readonly output: string | null;
  /** Message when `success` is false */
  readonly error: string | null;
  /** Optional metadata for logging, not sent to hosts */
  readonly metadata?: ToolResultMetadata;
}

/** The tri-field shape hosts integrate against. */
export interface ToolEnvelope {
  success: boolean;
  output: string | null;
  error: string | null;
}

/**
 * A tool adapter over an external library or process.
 */
export interface ToolAdapter {
  readonly name: string;
  readonly description: string;
  readonly category: ToolCategory;
  /** Ordered; required entries precede optional ones */
  readonly parameters: readonly ParameterSpec[];
  /** Fixed action vocabulary */
  readonly actions: readonly string[];
  /** Action used when the caller names none */
  readonly defaultAction?: string;
  execute(action: string, params?: ToolParams): Promise<ToolResult>;
  /** Release any live session handle */
  dispose?(): Promise<void>;
}

/**
 * Context handed to adapter factories by the catalog.
 */
export interface ToolContext {
  readonly logger: Logger;
  readonly config: ToolkitConfig;
}

// ============================================================================
// Result helpers
// ============================================================================

export function okResult(output: string, metadata?: ToolResultMetadata): ToolResult {
  return metadata ? { success: true, output, error: null, metadata } : { success: true, output, error: null };
}

export function errorResult(
  error: string,
  code: ToolErrorCode = ToolErrorCodes.EXECUTION_FAILED,
  output: string | null = null,
): ToolResult {
  return { success: false, output, error, metadata: { code } };
}

/**
 * Strip a result down to the host contract.
 */
export function toEnvelope(result: ToolResult): ToolEnvelope {
  return { success: result.success, output: result.output, error: result.error };
}

export function resultCode(result: ToolResult): ToolErrorCode | undefined {
  return result.metadata?.code;
}
