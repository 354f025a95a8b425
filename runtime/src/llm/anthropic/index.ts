/**
 * Anthropic Claude LLM provider module
 *
 * @module
 */

export { AnthropicProvider } from "./adapter.js";
export type { AnthropicProviderConfig } from "./types.js";
