/**
 * Bridge-specific error classes for @toolbelt/runtime
 *
 * @module
 */

import { ToolkitError, ToolkitErrorCodes } from "../types/errors.js";

/**
 * Error thrown when a framework bridge cannot wrap an adapter.
 */
export class BridgeError extends ToolkitError {
  /** The bridge that produced the error (e.g. "framework", "mcp") */
  public readonly bridge: string;
  /** The reason the bridge operation failed */
  public readonly reason: string;

  constructor(bridge: string, reason: string) {
    super(
      `Bridge "${bridge}" error: ${reason}`,
      ToolkitErrorCodes.BRIDGE_ERROR,
    );
    this.name = "BridgeError";
    this.bridge = bridge;
    this.reason = reason;
  }
}
