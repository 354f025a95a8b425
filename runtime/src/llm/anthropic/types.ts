/**
 * Anthropic provider configuration types
 *
 * @module
 */

/**
 * Configuration specific to the Anthropic Claude provider.
 */
export interface AnthropicProviderConfig {
  /** API key; the SDK falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
  /** Base URL for the Anthropic API */
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** SDK retry count (default: 2) */
  maxRetries?: number;
}
