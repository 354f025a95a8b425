/**
 * Shared lazy-import helper for LLM provider SDKs.
 *
 * The SDKs are declared dependencies, so each caller passes a literal
 * `import()` and keeps the package's own types. Loading is still deferred to
 * first use so a missing or broken install only affects its provider.
 *
 * @module
 */

import { LLMProviderError } from './errors.js';

/**
 * Run a provider's `import()` loader, wrapping failure with an install hint.
 *
 * @param packageName - npm package behind the loader (e.g. '@anthropic-ai/sdk')
 * @param providerName - Provider name for error messages (e.g. 'anthropic')
 * @param loader - `() => import('<packageName>')`
 */
export async function ensureLazyImport<T>(
  packageName: string,
  providerName: string,
  loader: () => Promise<T>,
): Promise<T> {
  try {
    return await loader();
  } catch {
    throw new LLMProviderError(
      providerName,
      `${packageName} package not installed. Install it: npm install ${packageName}`,
    );
  }
}
