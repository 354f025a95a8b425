/**
 * Ollama local LLM provider module
 *
 * @module
 */

export { DEFAULT_OLLAMA_HOST, OllamaProvider } from "./adapter.js";
export type { OllamaProviderConfig } from "./types.js";
