/**
 * Timeout helper for LLM provider calls.
 *
 * @module
 */

import { LLMTimeoutError } from './errors.js';

/**
 * Execute an async provider call with an explicit AbortController timeout.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  providerName: string,
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || timeoutMs <= 0) {
    return fn(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new LLMTimeoutError(providerName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
