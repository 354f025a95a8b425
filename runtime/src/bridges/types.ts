/**
 * Type definitions for the framework bridge.
 *
 * @module
 */

import type { ParameterSpec, ParameterType } from '../tools/types.js';
import type { Logger } from '../utils/logger.js';

/** TypeScript type a declared parameter type accepts. */
export type ParameterValue<T extends ParameterType> = T extends 'string'
  ? string
  : T extends 'integer' | 'number'
    ? number
    : T extends 'boolean'
      ? boolean
      : T extends 'array'
        ? unknown[]
        : Record<string, unknown>;

type ArgOf<S extends ParameterSpec> = ParameterValue<S['type']>;

/**
 * Positional arguments for a parameter schema. With a const schema, required
 * entries are mandatory and optional ones accept `null`; with a widened
 * `ParameterSpec[]` any values are accepted.
 */
export type ForwardArgs<P extends readonly ParameterSpec[]> = P extends readonly []
  ? []
  : P extends readonly [infer Head extends ParameterSpec, ...infer Rest extends readonly ParameterSpec[]]
    ? Head extends { readonly required: true }
      ? [ArgOf<Head>, ...ForwardArgs<Rest>]
      : [(ArgOf<Head> | null)?, ...ForwardArgs<Rest>]
    : unknown[];

/** Per-input description handed to the host framework. */
export interface BridgedInput {
  type: ParameterType;
  description: string;
  /** Set on optional inputs */
  nullable?: true;
  default?: ParameterSpec['default'];
  enum?: readonly string[];
}

/**
 * An adapter presented as a host-framework callable.
 */
export interface BridgedTool<P extends readonly ParameterSpec[] = readonly ParameterSpec[]> {
  readonly name: string;
  readonly description: string;
  readonly inputs: Readonly<Record<string, BridgedInput>>;
  readonly outputType: 'string';
  readonly parameters: P;
  /** Call with arguments in declared parameter order. */
  forward(...args: ForwardArgs<P>): Promise<string>;
  /** Call with keyword arguments. */
  call(kwargs?: Readonly<Record<string, unknown>>): Promise<string>;
}

/**
 * Handler used by LLM tool-calling loops. Never throws; failures come back as
 * `Error: ...` text.
 */
export type ToolHandler = (name: string, args: Record<string, unknown>) => Promise<string>;

export interface FrameworkBridgeConfig {
  logger?: Logger;
}
