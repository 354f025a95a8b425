/**
 * LLM provider adapters for @toolbelt/runtime
 *
 * @module
 */

export type {
  LLMMessage,
  LLMProvider,
  LLMRequestOptions,
  LLMResponse,
  LLMTool,
  LLMUsage,
  MessageRole,
} from "./types.js";
export { MESSAGE_ROLES, isMessageRole } from "./types.js";

export { LLMProviderError, LLMTimeoutError, mapLLMError } from "./errors.js";
export { withTimeout } from "./timeout.js";
export { ensureLazyImport } from "./lazy-import.js";

export { OpenAIProvider } from "./openai/index.js";
export type { OpenAIProviderConfig } from "./openai/index.js";
export { AnthropicProvider } from "./anthropic/index.js";
export type { AnthropicProviderConfig } from "./anthropic/index.js";
export { OllamaProvider, DEFAULT_OLLAMA_HOST } from "./ollama/index.js";
export type { OllamaProviderConfig } from "./ollama/index.js";
export { BedrockProvider } from "./bedrock/index.js";
export type { BedrockProviderConfig } from "./bedrock/index.js";

export { createLLMProvider, isOllamaEndpoint } from "./factory.js";
export type { ProviderFactory, ProviderOptions } from "./factory.js";
