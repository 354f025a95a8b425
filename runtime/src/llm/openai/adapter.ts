/**
 * OpenAI chat provider adapter.
 *
 * Uses the `openai` SDK, loaded lazily on first use. The same adapter serves
 * OpenAI-compatible local servers through `baseURL`.
 *
 * @module
 */

import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse } from '../types.js';
import { toUsage } from '../types.js';
import type { OpenAIProviderConfig } from './types.js';
import { mapLLMError } from '../errors.js';
import { ensureLazyImport } from '../lazy-import.js';
import { withTimeout } from '../timeout.js';

function toOpenAIMessage(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAIProvider implements LLMProvider {
  readonly name: string;

  private client: OpenAI | null = null;
  private readonly config: OpenAIProviderConfig;

  constructor(config: OpenAIProviderConfig = {}) {
    this.config = config;
    this.name = config.name ?? 'openai';
  }

  async chat(messages: LLMMessage[], options: LLMRequestOptions): Promise<LLMResponse> {
    try {
      const client = await this.ensureClient();
      const completion = await withTimeout(
        (signal) =>
          client.chat.completions.create(
            {
              model: options.model,
              messages: messages.map(toOpenAIMessage),
              temperature: options.temperature,
              max_tokens: options.maxTokens,
            },
            { signal },
          ),
        this.config.timeoutMs,
        this.name,
      );

      const usage = completion.usage;
      return {
        content: completion.choices[0]?.message.content ?? '',
        model: completion.model || options.model,
        usage: usage ? toUsage(usage.prompt_tokens, usage.completion_tokens, usage.total_tokens) : undefined,
      };
    } catch (err: unknown) {
      throw mapLLMError(this.name, err);
    }
  }

  private async ensureClient(): Promise<OpenAI> {
    if (this.client) return this.client;
    const mod = await ensureLazyImport('openai', this.name, () => import('openai'));
    this.client = new mod.default({ apiKey: this.config.apiKey, baseURL: this.config.baseURL });
    return this.client;
  }
}
