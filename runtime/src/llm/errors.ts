/**
 * LLM-specific error types for @toolbelt/runtime
 *
 * @module
 */

import { ToolkitError, ToolkitErrorCodes, toErrorMessage } from '../types/errors.js';
import { isRecord } from '../utils/type-guards.js';

/**
 * Error thrown when an LLM provider SDK is missing or returns an error.
 */
export class LLMProviderError extends ToolkitError {
  public readonly providerName: string;
  /** Message without the provider prefix */
  public readonly reason: string;
  public readonly statusCode?: number;

  constructor(providerName: string, message: string, statusCode?: number) {
    super(
      `${providerName} error: ${message}`,
      ToolkitErrorCodes.LLM_PROVIDER_ERROR,
    );
    this.name = 'LLMProviderError';
    this.providerName = providerName;
    this.reason = message;
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when an LLM request times out.
 */
export class LLMTimeoutError extends ToolkitError {
  public readonly providerName: string;
  public readonly timeoutMs: number;

  constructor(providerName: string, timeoutMs: number) {
    super(
      `${providerName} request timed out after ${timeoutMs}ms`,
      ToolkitErrorCodes.LLM_TIMEOUT,
    );
    this.name = 'LLMTimeoutError';
    this.providerName = providerName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Normalize anything an SDK call rejects with into a provider error.
 * Toolkit LLM errors pass through unchanged.
 */
export function mapLLMError(providerName: string, err: unknown): LLMProviderError | LLMTimeoutError {
  if (err instanceof LLMProviderError || err instanceof LLMTimeoutError) return err;
  const status = isRecord(err) && typeof err.status === 'number' ? err.status : undefined;
  return new LLMProviderError(providerName, toErrorMessage(err), status);
}
