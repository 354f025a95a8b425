/**
 * Error types for @toolbelt/runtime
 *
 * Two layers live here. {@link ToolkitError} and its subclasses are thrown by
 * programmatic APIs (config loading, bridge construction, provider setup).
 * {@link ToolErrorCodes} classify failures that adapters report through the
 * result envelope instead of throwing.
 */

// ============================================================================
// Toolkit Error Codes
// ============================================================================

/**
 * String error codes for thrown toolkit errors.
 */
export const ToolkitErrorCodes = {
  /** Tool name absent from the catalog or unavailable */
  NOT_FOUND: 'NOT_FOUND',
  /** Configuration file or environment failed validation */
  CONFIG_ERROR: 'CONFIG_ERROR',
  /** Framework bridge could not wrap an adapter */
  BRIDGE_ERROR: 'BRIDGE_ERROR',
  /** LLM provider returned an error or is missing */
  LLM_PROVIDER_ERROR: 'LLM_PROVIDER_ERROR',
  /** LLM request timed out */
  LLM_TIMEOUT: 'LLM_TIMEOUT',
} as const;

/** Union type of all toolkit error code values */
export type ToolkitErrorCode = (typeof ToolkitErrorCodes)[keyof typeof ToolkitErrorCodes];

// ============================================================================
// Envelope Condition Codes
// ============================================================================

/**
 * Conditions an adapter reports in `metadata.code` of a failed (or partially
 * successful) result. These never propagate as exceptions.
 */
export const ToolErrorCodes = {
  INVALID_ACTION: 'INVALID_ACTION',
  MISSING_PARAMETER: 'MISSING_PARAMETER',
  /** Parameter present but malformed or out of range */
  INVALID_PARAMETER: 'INVALID_PARAMETER',
  NOT_OPEN: 'NOT_OPEN',
  SESSION_CLOSED: 'SESSION_CLOSED',
  TIMED_OUT: 'TIMED_OUT',
  NOT_FOUND: 'NOT_FOUND',
  /** PNG written but base64 step failed; reported with success=true */
  ENCODING_FAILURE: 'ENCODING_FAILURE',
  /** Blocked by a security pattern before anything ran */
  DENIED: 'DENIED',
  /** Wrapped library or process reported failure */
  EXECUTION_FAILED: 'EXECUTION_FAILED',
} as const;

export type ToolErrorCode = (typeof ToolErrorCodes)[keyof typeof ToolErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all toolkit errors.
 *
 * @example
 * ```typescript
 * try {
 *   catalog.requireTool('nope');
 * } catch (err) {
 *   if (isToolkitError(err) && err.code === ToolkitErrorCodes.NOT_FOUND) {
 *     // ...
 *   }
 * }
 * ```
 */
export class ToolkitError extends Error {
  /** The error code identifying this error type */
  public readonly code: ToolkitErrorCode;

  constructor(message: string, code: ToolkitErrorCode) {
    super(message);
    this.name = 'ToolkitError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * Error thrown when configuration input fails validation.
 */
export class ToolkitConfigError extends ToolkitError {
  /** One entry per failing field, `path: message` */
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      ToolkitErrorCodes.CONFIG_ERROR,
    );
    this.name = 'ToolkitConfigError';
    this.issues = issues;
  }
}

/**
 * Type guard for toolkit errors.
 */
export function isToolkitError(error: unknown): error is ToolkitError {
  return error instanceof ToolkitError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
