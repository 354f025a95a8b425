/**
 * Type definitions for @toolbelt/runtime
 * @packageDocumentation
 */

export {
  ToolkitErrorCodes,
  ToolErrorCodes,
  ToolkitError,
  ToolkitConfigError,
  isToolkitError,
  toErrorMessage,
} from './errors.js';
export type { ToolkitErrorCode, ToolErrorCode } from './errors.js';
