/**
 * Anthropic Claude chat provider adapter.
 *
 * Uses the `@anthropic-ai/sdk` package, loaded lazily on first use.
 *
 * @module
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse } from '../types.js';
import { toUsage } from '../types.js';
import type { AnthropicProviderConfig } from './types.js';
import { mapLLMError } from '../errors.js';
import { ensureLazyImport } from '../lazy-import.js';
import { withTimeout } from '../timeout.js';

type ConversationMessage = LLMMessage & { role: 'user' | 'assistant' };

function isConversationMessage(message: LLMMessage): message is ConversationMessage {
  return message.role !== 'system';
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  private client: Anthropic | null = null;
  private readonly config: AnthropicProviderConfig;

  constructor(config: AnthropicProviderConfig = {}) {
    this.config = config;
  }

  async chat(messages: LLMMessage[], options: LLMRequestOptions): Promise<LLMResponse> {
    // Anthropic takes the system prompt as a top-level parameter
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const conversation = messages
      .filter(isConversationMessage)
      .map((m) => ({ role: m.role, content: m.content }));

    try {
      const client = await this.ensureClient();
      const response = await withTimeout(
        (signal) =>
          client.messages.create(
            {
              model: options.model,
              max_tokens: options.maxTokens,
              temperature: options.temperature,
              messages: conversation,
              ...(system ? { system } : {}),
            },
            { signal },
          ),
        this.config.timeoutMs,
        this.name,
      );

      let content = '';
      for (const block of response.content) {
        if (block.type === 'text') content += block.text;
      }
      return {
        content,
        model: response.model || options.model,
        usage: toUsage(response.usage.input_tokens, response.usage.output_tokens),
      };
    } catch (err: unknown) {
      throw mapLLMError(this.name, err);
    }
  }

  private async ensureClient(): Promise<Anthropic> {
    if (this.client) return this.client;
    const mod = await ensureLazyImport('@anthropic-ai/sdk', this.name, () => import('@anthropic-ai/sdk'));
    this.client = new mod.default({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      maxRetries: this.config.maxRetries ?? 2,
    });
    return this.client;
  }
}
