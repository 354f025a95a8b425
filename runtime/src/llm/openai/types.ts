/**
 * OpenAI provider configuration types
 *
 * @module
 */

/**
 * Configuration for the OpenAI provider and OpenAI-compatible endpoints.
 */
export interface OpenAIProviderConfig {
  /** API key; the SDK falls back to OPENAI_API_KEY */
  apiKey?: string;
  /** Base URL for a compatible endpoint (e.g. a local server's /v1) */
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Provider name used in errors (default: "openai") */
  name?: string;
}
