/**
 * @toolbelt/mcp - the tool catalog as an MCP server
 *
 * @packageDocumentation
 */

export {
  createServer,
  createToolCallHandler,
  buildZodShape,
  SERVER_NAME,
  SERVER_VERSION,
} from './server.js';
export type { CreateServerOptions, ToolbeltServer } from './server.js';
export { toolTextResponse, toolErrorResponse, toolResultResponse } from './tools/response.js';
export type { ToolTextResponse } from './tools/response.js';
