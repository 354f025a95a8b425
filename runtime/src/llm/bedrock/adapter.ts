/**
 * AWS Bedrock chat provider adapter.
 *
 * Calls the model-agnostic Converse API through
 * `@aws-sdk/client-bedrock-runtime`, loaded lazily on first use.
 *
 * @module
 */

import type { BedrockRuntimeClient, Message, SystemContentBlock } from '@aws-sdk/client-bedrock-runtime';
import type { LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse } from '../types.js';
import { toUsage } from '../types.js';
import type { BedrockProviderConfig } from './types.js';
import { mapLLMError } from '../errors.js';
import { ensureLazyImport } from '../lazy-import.js';
import { withTimeout } from '../timeout.js';

type BedrockSdk = typeof import('@aws-sdk/client-bedrock-runtime');

const DEFAULT_REGION = 'us-east-1';

export class BedrockProvider implements LLMProvider {
  readonly name = 'bedrock';
  readonly region: string;

  private sdk: BedrockSdk | null = null;
  private client: BedrockRuntimeClient | null = null;
  private readonly timeoutMs: number | undefined;

  constructor(config: BedrockProviderConfig = {}) {
    this.region = config.region ?? DEFAULT_REGION;
    this.timeoutMs = config.timeoutMs;
  }

  async chat(messages: LLMMessage[], options: LLMRequestOptions): Promise<LLMResponse> {
    const system: SystemContentBlock[] = messages
      .filter((m) => m.role === 'system')
      .map((m) => ({ text: m.content }));
    const conversation: Message[] = [];
    for (const m of messages) {
      if (m.role !== 'system') conversation.push({ role: m.role, content: [{ text: m.content }] });
    }

    try {
      const { sdk, client } = await this.ensureClient();
      const command = new sdk.ConverseCommand({
        modelId: options.model,
        messages: conversation,
        system: system.length > 0 ? system : undefined,
        inferenceConfig: { maxTokens: options.maxTokens, temperature: options.temperature },
      });
      const response = await withTimeout(
        (signal) => client.send(command, { abortSignal: signal }),
        this.timeoutMs,
        this.name,
      );

      const content = (response.output?.message?.content ?? []).map((block) => block.text ?? '').join('');
      const usage = response.usage;
      return {
        content,
        model: options.model,
        usage: usage
          ? toUsage(usage.inputTokens ?? 0, usage.outputTokens ?? 0, usage.totalTokens)
          : undefined,
      };
    } catch (err: unknown) {
      throw mapLLMError(this.name, err);
    }
  }

  private async ensureClient(): Promise<{ sdk: BedrockSdk; client: BedrockRuntimeClient }> {
    if (this.sdk && this.client) return { sdk: this.sdk, client: this.client };
    const sdk = await ensureLazyImport(
      '@aws-sdk/client-bedrock-runtime',
      this.name,
      () => import('@aws-sdk/client-bedrock-runtime'),
    );
    const client = new sdk.BedrockRuntimeClient({ region: this.region });
    this.sdk = sdk;
    this.client = client;
    return { sdk, client };
  }
}
