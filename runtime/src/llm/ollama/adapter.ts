/**
 * Ollama local LLM provider adapter.
 *
 * Uses the `ollama` SDK for local model inference, loaded lazily on first use.
 *
 * @module
 */

import type { Ollama } from 'ollama';
import type { LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse } from '../types.js';
import { toUsage } from '../types.js';
import type { OllamaProviderConfig } from './types.js';
import { mapLLMError } from '../errors.js';
import { ensureLazyImport } from '../lazy-import.js';
import { withTimeout } from '../timeout.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama';

  private client: Ollama | null = null;
  private readonly host: string;
  private readonly timeoutMs: number | undefined;

  constructor(config: OllamaProviderConfig = {}) {
    this.host = config.host ?? DEFAULT_OLLAMA_HOST;
    this.timeoutMs = config.timeoutMs;
  }

  async chat(messages: LLMMessage[], options: LLMRequestOptions): Promise<LLMResponse> {
    try {
      const client = await this.ensureClient();
      const response = await withTimeout(
        (signal) => {
          // The SDK has no per-request signal; abort() cancels in-flight requests
          signal.addEventListener('abort', () => client.abort(), { once: true });
          return client.chat({
            model: options.model,
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            stream: false,
            options: { temperature: options.temperature, num_predict: options.maxTokens },
          });
        },
        this.timeoutMs,
        this.name,
      );

      const promptTokens = response.prompt_eval_count ?? 0;
      const completionTokens = response.eval_count ?? 0;
      return {
        content: response.message.content,
        model: response.model || options.model,
        usage: promptTokens + completionTokens > 0 ? toUsage(promptTokens, completionTokens) : undefined,
      };
    } catch (err: unknown) {
      throw mapLLMError(this.name, err);
    }
  }

  private async ensureClient(): Promise<Ollama> {
    if (this.client) return this.client;
    const mod = await ensureLazyImport('ollama', this.name, () => import('ollama'));
    this.client = new mod.Ollama({ host: this.host });
    return this.client;
  }
}
