/**
 * Framework bridge.
 *
 * Presents tool adapters to host frameworks as callables with an explicit,
 * ordered parameter list, as OpenAI-format function specs, and as a
 * never-throwing tool handler.
 *
 * Calls return a promise: the caller awaits it whether or not it already
 * runs inside another async context. Overlapping calls on one adapter are
 * not coordinated here.
 *
 * @module
 */

import type { JSONSchema, ParameterSpec, ToolAdapter, ToolParams, ToolResult } from '../tools/types.js';
import type { LLMTool } from '../llm/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { toErrorMessage } from '../types/errors.js';
import type { BridgedInput, BridgedTool, ForwardArgs, FrameworkBridgeConfig, ToolHandler } from './types.js';
import { BridgeError } from './errors.js';

const ACTION_PARAMETER = 'action';

/**
 * Render a result as the string a host framework receives.
 */
export function resultText(result: ToolResult): string {
  return result.success ? (result.output ?? '') : `Error: ${result.error ?? 'Unknown error'}`;
}

/**
 * @throws BridgeError if a required parameter follows an optional one
 */
export function assertParameterOrder(toolName: string, parameters: readonly ParameterSpec[]): void {
  let optionalSeen: string | undefined;
  for (const spec of parameters) {
    if (!spec.required) {
      optionalSeen ??= spec.name;
    } else if (optionalSeen !== undefined) {
      throw new BridgeError(
        'framework',
        `Tool "${toolName}": required parameter "${spec.name}" follows optional parameter "${optionalSeen}"`,
      );
    }
  }
}

export function toInputs(parameters: readonly ParameterSpec[]): Record<string, BridgedInput> {
  const inputs: Record<string, BridgedInput> = {};
  for (const spec of parameters) {
    const input: BridgedInput = { type: spec.type, description: spec.description };
    if (!spec.required) input.nullable = true;
    if (spec.default !== undefined) input.default = spec.default;
    if (spec.enum) input.enum = spec.enum;
    inputs[spec.name] = input;
  }
  return inputs;
}

/**
 * JSON Schema object for a parameter list.
 */
export function toJsonSchema(parameters: readonly ParameterSpec[]): JSONSchema {
  const properties: Record<string, JSONSchema> = {};
  for (const spec of parameters) {
    const property: JSONSchema = { type: spec.type, description: spec.description };
    if (spec.enum) property.enum = [...spec.enum];
    if (spec.default !== undefined) property.default = spec.default;
    properties[spec.name] = property;
  }
  return {
    type: 'object',
    properties,
    required: parameters.filter((spec) => spec.required).map((spec) => spec.name),
  };
}

/**
 * Map keyword arguments onto the adapter's `execute(action, params)`.
 *
 * Absent and `null` values fall back to declared defaults. The `action`
 * parameter, when declared, selects the action; otherwise `defaultAction`.
 */
export function splitArguments(
  adapter: ToolAdapter,
  kwargs: Readonly<Record<string, unknown>>,
): { action: string; params: ToolParams } {
  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(kwargs)) {
    if (value !== undefined && value !== null) params[key] = value;
  }
  for (const spec of adapter.parameters) {
    if (params[spec.name] === undefined && spec.default !== undefined) params[spec.name] = spec.default;
  }

  const declaresAction = adapter.parameters.some((spec) => spec.name === ACTION_PARAMETER);
  const requested = declaresAction ? params[ACTION_PARAMETER] : undefined;
  if (declaresAction) delete params[ACTION_PARAMETER];

  const action = typeof requested === 'string' && requested !== '' ? requested : (adapter.defaultAction ?? '');
  return { action, params };
}

// ============================================================================
// FrameworkBridge
// ============================================================================

/**
 * Wraps tool adapters for host frameworks.
 *
 * @example
 * ```typescript
 * const bridge = new FrameworkBridge({ logger });
 * const bash = bridge.wrap(catalog.requireTool('bash'));
 * await bash.forward('ls -la');
 * ```
 */
export class FrameworkBridge {
  private readonly logger: Logger;

  constructor(config?: FrameworkBridgeConfig) {
    this.logger = config?.logger ?? silentLogger;
  }

  /**
   * @throws BridgeError if the adapter's parameter list is out of order
   */
  wrap<P extends readonly ParameterSpec[]>(adapter: ToolAdapter & { readonly parameters: P }): BridgedTool<P> {
    assertParameterOrder(adapter.name, adapter.parameters);
    const logger = this.logger;
    const parameters = adapter.parameters;

    const call = async (kwargs: Readonly<Record<string, unknown>> = {}): Promise<string> => {
      try {
        const { action, params } = splitArguments(adapter, kwargs);
        logger.debug(`Bridge call: ${adapter.name}.${action}`);
        const result = await adapter.execute(action, params);
        if (!result.success) {
          logger.warn(`Tool "${adapter.name}" returned error: ${result.error ?? ''}`);
        }
        return resultText(result);
      } catch (err) {
        const message = toErrorMessage(err);
        logger.error(`Tool "${adapter.name}" threw: ${message}`);
        return `Error executing tool: ${message}`;
      }
    };

    return {
      name: adapter.name,
      description: adapter.description,
      inputs: toInputs(parameters),
      outputType: 'string',
      parameters,
      forward: (...args: ForwardArgs<P>) => {
        const values: readonly unknown[] = args;
        const kwargs: Record<string, unknown> = {};
        parameters.forEach((spec, index) => {
          if (index < values.length) kwargs[spec.name] = values[index];
        });
        return call(kwargs);
      },
      call,
    };
  }

  wrapAll(adapters: readonly ToolAdapter[]): BridgedTool[] {
    const wrapped = adapters.map((adapter) => this.wrap(adapter));
    this.logger.info(`Bridged ${wrapped.length} tool(s)`);
    return wrapped;
  }

  toLLMTools(adapters: readonly ToolAdapter[]): LLMTool[] {
    return toLLMTools(adapters);
  }

  createToolHandler(adapters: readonly ToolAdapter[]): ToolHandler {
    return createToolHandler(adapters, this.logger);
  }
}

/**
 * OpenAI-format function specs for the given adapters.
 */
export function toLLMTools(adapters: readonly ToolAdapter[]): LLMTool[] {
  return adapters.map((adapter) => ({
    type: 'function',
    function: {
      name: adapter.name,
      description: adapter.description,
      parameters: toJsonSchema(adapter.parameters),
    },
  }));
}

/**
 * Create a ToolHandler closure over the given adapters.
 *
 * The returned handler:
 * 1. Looks up the adapter by name
 * 2. Runs the call through the bridge
 * 3. Returns the output, or `Error: ...` text (never throws)
 */
export function createToolHandler(adapters: readonly ToolAdapter[], logger: Logger = silentLogger): ToolHandler {
  const bridge = new FrameworkBridge({ logger });
  const tools = new Map<string, BridgedTool>();
  for (const adapter of adapters) tools.set(adapter.name, bridge.wrap(adapter));

  return async (name, args) => {
    const tool = tools.get(name);
    if (!tool) {
      logger.warn(`Tool not found: "${name}"`);
      return `Error: Tool not found: "${name}"`;
    }
    return tool.call(args);
  };
}
