/**
 * Provider construction for the chat tools and the crawler's LLM strategy.
 *
 * @module
 */

import type { ChatProviderName } from '../config/schema.js';
import type { LLMProvider } from './types.js';
import { AnthropicProvider } from './anthropic/index.js';
import { BedrockProvider } from './bedrock/index.js';
import { DEFAULT_OLLAMA_HOST, OllamaProvider } from './ollama/index.js';
import { OpenAIProvider } from './openai/index.js';

export interface ProviderOptions {
  apiKey?: string;
  /** Custom endpoint; for `local`, selects Ollama or an OpenAI-compatible server */
  baseUrl?: string;
  /** AWS region for `bedrock` */
  region?: string;
  /** Ollama host used by `local` when no `baseUrl` is given */
  ollamaHost?: string;
  timeoutMs?: number;
}

export type ProviderFactory = (name: ChatProviderName, options: ProviderOptions) => LLMProvider;

/** API key sent to local OpenAI-compatible servers, which ignore it. */
const LOCAL_API_KEY = 'local';

/**
 * Whether a `local` endpoint speaks the Ollama protocol.
 */
export function isOllamaEndpoint(baseUrl: string | undefined): boolean {
  return !baseUrl || baseUrl.includes('ollama') || baseUrl.includes(':11434');
}

export const createLLMProvider: ProviderFactory = (name, options) => {
  switch (name) {
    case 'openai':
      return new OpenAIProvider({ apiKey: options.apiKey, baseURL: options.baseUrl, timeoutMs: options.timeoutMs });
    case 'anthropic':
      return new AnthropicProvider({ apiKey: options.apiKey, baseURL: options.baseUrl, timeoutMs: options.timeoutMs });
    case 'bedrock':
      return new BedrockProvider({ region: options.region, timeoutMs: options.timeoutMs });
    case 'local':
      if (isOllamaEndpoint(options.baseUrl)) {
        return new OllamaProvider({
          host: options.baseUrl ?? options.ollamaHost ?? DEFAULT_OLLAMA_HOST,
          timeoutMs: options.timeoutMs,
        });
      }
      return new OpenAIProvider({
        name: 'local',
        apiKey: options.apiKey ?? LOCAL_API_KEY,
        baseURL: `${(options.baseUrl ?? '').replace(/\/+$/, '')}/v1`,
        timeoutMs: options.timeoutMs,
      });
  }
};
