/**
 * OpenAI LLM provider module
 *
 * @module
 */

export { OpenAIProvider } from "./adapter.js";
export type { OpenAIProviderConfig } from "./types.js";
