/**
 * Ollama provider configuration types
 *
 * @module
 */

/**
 * Configuration specific to the Ollama local provider.
 */
export interface OllamaProviderConfig {
  /** Ollama server host (default: 'http://localhost:11434') */
  host?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}
