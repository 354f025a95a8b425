/**
 * Framework bridge: adapters as host-framework callables.
 *
 * @module
 */

export type {
  BridgedInput,
  BridgedTool,
  ForwardArgs,
  FrameworkBridgeConfig,
  ParameterValue,
  ToolHandler,
} from './types.js';

export { BridgeError } from './errors.js';
export {
  FrameworkBridge,
  assertParameterOrder,
  createToolHandler,
  resultText,
  splitArguments,
  toInputs,
  toJsonSchema,
  toLLMTools,
} from './framework.js';
