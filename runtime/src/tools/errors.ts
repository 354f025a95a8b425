/**
 * Tool-specific error types for @toolbelt/runtime
 *
 * @module
 */

import { ToolkitError, ToolkitErrorCodes } from '../types/errors.js';

/**
 * Error thrown when a tool cannot be found by name, or was declared but its
 * feature probe failed.
 */
export class ToolNotFoundError extends ToolkitError {
  /** The name of the tool that was not found */
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool not found: "${toolName}"`, ToolkitErrorCodes.NOT_FOUND);
    this.name = 'ToolNotFoundError';
    this.toolName = toolName;
  }
}
