import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  silentLogger,
  splitArguments,
  toErrorMessage,
  type Logger,
  type ParameterSpec,
  type ToolAdapter,
  type ToolCatalog,
} from '@toolbelt/runtime';
import { toolErrorResponse, toolResultResponse, type ToolTextResponse } from './tools/response.js';

export const SERVER_NAME = 'Toolbelt';
export const SERVER_VERSION = '0.1.0';

export interface CreateServerOptions {
  logger?: Logger;
  /** Restrict registration to these tool names (default: every available tool) */
  tools?: readonly string[];
}

export interface ToolbeltServer {
  server: McpServer;
  /** Live adapter instances backing the registered tools */
  adapters: ToolAdapter[];
  /** Close the server and dispose every adapter */
  close(): Promise<void>;
}

function baseSchema(spec: ParameterSpec): z.ZodTypeAny {
  if (spec.enum) {
    const [first, ...rest] = spec.enum;
    if (first !== undefined) return z.enum([first, ...rest]);
  }
  switch (spec.type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
  }
}

/**
 * Zod input shape for an adapter's parameter list.
 */
export function buildZodShape(parameters: readonly ParameterSpec[]): Record<string, z.ZodTypeAny> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const spec of parameters) {
    let schema = baseSchema(spec);
    if (!spec.required) {
      schema = schema.optional();
      if (spec.default !== undefined) schema = schema.default(spec.default);
    }
    shape[spec.name] = schema.describe(spec.description);
  }
  return shape;
}

export function createToolCallHandler(
  adapter: ToolAdapter,
  logger: Logger = silentLogger,
): (args: Readonly<Record<string, unknown>>) => Promise<ToolTextResponse> {
  return async (args) => {
    try {
      const { action, params } = splitArguments(adapter, args);
      logger.debug(`MCP call: ${adapter.name}.${action}`);
      const result = await adapter.execute(action, params);
      if (!result.success) {
        logger.warn(`Tool "${adapter.name}" returned error: ${result.error ?? ''}`);
      }
      return toolResultResponse(result);
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error(`Tool "${adapter.name}" threw: ${message}`);
      return toolErrorResponse(message);
    }
  };
}

export function createServer(catalog: ToolCatalog, options: CreateServerOptions = {}): ToolbeltServer {
  const logger = options.logger ?? silentLogger;
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const adapters = catalog.createToolSuite(options.tools);
  for (const adapter of adapters) {
    const handler = createToolCallHandler(adapter, logger);
    server.tool(adapter.name, adapter.description, buildZodShape(adapter.parameters), (args) => handler(args));
  }
  logger.info(`Registered ${adapters.length} MCP tool(s)`);

  return {
    server,
    adapters,
    close: async () => {
      await server.close();
      const outcomes = await Promise.allSettled(adapters.map(async (adapter) => adapter.dispose?.()));
      outcomes.forEach((outcome, index) => {
        if (outcome.status === 'rejected') {
          logger.warn(`Failed to dispose "${adapters[index].name}": ${toErrorMessage(outcome.reason)}`);
        }
      });
    },
  };
}
