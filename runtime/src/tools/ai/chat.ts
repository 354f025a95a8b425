/**
 * Chat completion tools over the LLM provider adapters.
 *
 * @module
 */

import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, intParam, missingParameter, nonEmptyParam, numberParam } from "../action.js";
import { ToolErrorCodes, toErrorMessage } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import { isRecord } from "../../utils/type-guards.js";
import type { ChatProviderName, ToolkitConfig } from "../../config/schema.js";
import { ChatProviderNameSchema, defaultToolkitConfig } from "../../config/schema.js";
import type { LLMMessage, LLMResponse } from "../../llm/types.js";
import { isMessageRole } from "../../llm/types.js";
import { LLMProviderError, LLMTimeoutError } from "../../llm/errors.js";
import type { ProviderFactory } from "../../llm/factory.js";
import { createLLMProvider } from "../../llm/factory.js";

export interface ChatToolConfig {
  logger?: Logger;
  /** Defaults for provider, model, sampling and credentials */
  chat?: ToolkitConfig["chat"];
  providerFactory?: ProviderFactory;
}

const PROVIDER_LABELS: Record<ChatProviderName, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  bedrock: "Bedrock",
  local: "Local",
};

// ============================================================================
// Message handling
// ============================================================================

/**
 * Turn the `messages` parameter into a list of candidate messages.
 *
 * Accepts an array, a single object, a JSON string of either, or plain text
 * (one user message).
 */
export function parseMessages(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (isRecord(raw)) return [raw];
  const text = typeof raw === "string" ? raw : String(raw);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [{ role: "user", content: text }];
  }
  if (Array.isArray(parsed)) return parsed;
  if (isRecord(parsed)) return [parsed];
  return [{ role: "user", content: text }];
}

function isLLMMessage(value: unknown): value is LLMMessage {
  return isRecord(value) && isMessageRole(value.role) && typeof value.content === "string";
}

export function applySystemPrompt(messages: LLMMessage[], systemPrompt: string): LLMMessage[] {
  const [first, ...rest] = messages;
  if (first?.role === "system") {
    return [{ role: "system", content: `${systemPrompt}\n\n${first.content}` }, ...rest];
  }
  return [{ role: "system", content: systemPrompt }, ...messages];
}

function formatResponse(provider: ChatProviderName, response: LLMResponse, region: string): string {
  const usage = response.usage;
  switch (provider) {
    case "openai":
      return usage
        ? `Response: ${response.content}\n\nUsage: ${usage.promptTokens} prompt tokens, ` +
            `${usage.completionTokens} completion tokens, ${usage.totalTokens} total tokens`
        : `Response: ${response.content}`;
    case "anthropic":
      return usage
        ? `Response: ${response.content}\n\nUsage: ${usage.promptTokens} input tokens, ${usage.completionTokens} output tokens`
        : `Response: ${response.content}`;
    case "bedrock": {
      let text = `Response: ${response.content}\n\nModel: ${response.model} (AWS Bedrock)\nRegion: ${region}`;
      if (usage) {
        text +=
          `\nUsage: ${usage.promptTokens} prompt tokens, ${usage.completionTokens} completion tokens, ` +
          `${usage.totalTokens} total tokens`;
      }
      return text;
    }
    case "local":
      return usage
        ? `Response: ${response.content}\n\nUsage: ${usage.promptTokens} prompt tokens, ${usage.completionTokens} completion tokens`
        : `Response: ${response.content}`;
  }
}

// ============================================================================
// ChatCompletionTool
// ============================================================================

export class ChatCompletionTool implements ToolAdapter {
  readonly name = "chat_completion";
  readonly description =
    "Generate chat completions using various LLM providers (OpenAI, Anthropic, AWS Bedrock, local). " +
    "Can handle conversations and single prompts.";
  readonly category = "ai";
  readonly actions = ["complete"] as const;
  readonly defaultAction = "complete";
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly chat: ToolkitConfig["chat"];
  private readonly providerFactory: ProviderFactory;

  constructor(config: ChatToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.chat = config.chat ?? defaultToolkitConfig().chat;
    this.providerFactory = config.providerFactory ?? createLLMProvider;
    this.parameters = [
      {
        name: "messages",
        type: "string",
        description: "JSON string of messages array or single message string",
        required: true,
      },
      {
        name: "provider",
        type: "string",
        description: "LLM provider: openai, anthropic, bedrock, local",
        required: false,
        default: this.chat.provider,
      },
      {
        name: "model",
        type: "string",
        description: "Model name (e.g., gpt-4o-mini, claude-3-5-haiku-latest, anthropic.claude-3-haiku-20240307-v1:0)",
        required: false,
        default: this.chat.model,
      },
      {
        name: "temperature",
        type: "number",
        description: "Temperature for response generation (0.0 to 2.0)",
        required: false,
        default: this.chat.temperature,
      },
      {
        name: "max_tokens",
        type: "integer",
        description: "Maximum tokens in response",
        required: false,
        default: this.chat.maxTokens,
      },
      { name: "system_prompt", type: "string", description: "System prompt to set context", required: false },
      {
        name: "api_key",
        type: "string",
        description: "API key for the provider (if not set in environment)",
        required: false,
      },
      { name: "base_url", type: "string", description: "Base URL for local or custom endpoints", required: false },
      {
        name: "region",
        type: "string",
        description: "AWS region for Bedrock",
        required: false,
        default: this.chat.region,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Chat completion", { complete: (p) => this.complete(p) }, action, params, this.logger);
  }

  private async complete(params: ToolParams): Promise<ToolResult> {
    const raw = params.messages;
    if (raw === undefined || raw === null || raw === "") return missingParameter("messages is required");

    let messages: LLMMessage[] = [];
    for (const candidate of parseMessages(raw)) {
      if (!isLLMMessage(candidate)) {
        return errorResult(`Invalid message format: ${JSON.stringify(candidate)}`, ToolErrorCodes.INVALID_PARAMETER);
      }
      messages.push({ role: candidate.role, content: candidate.content });
    }
    const systemPrompt = nonEmptyParam(params, "system_prompt");
    if (systemPrompt !== undefined) messages = applySystemPrompt(messages, systemPrompt);

    const requested = (nonEmptyParam(params, "provider") ?? this.chat.provider).toLowerCase();
    const parsedProvider = ChatProviderNameSchema.safeParse(requested);
    if (!parsedProvider.success) {
      return errorResult(`Unknown provider: ${requested}. Supported: openai, anthropic, bedrock, local`);
    }
    const providerName = parsedProvider.data;
    const label = PROVIDER_LABELS[providerName];

    const model = nonEmptyParam(params, "model") ?? this.chat.model;
    const temperature = numberParam(params, "temperature") ?? this.chat.temperature;
    const maxTokens = intParam(params, "max_tokens") ?? this.chat.maxTokens;
    const region = nonEmptyParam(params, "region") ?? this.chat.region;

    const provider = this.providerFactory(providerName, {
      apiKey: nonEmptyParam(params, "api_key") ?? this.defaultApiKey(providerName),
      baseUrl: nonEmptyParam(params, "base_url"),
      region,
      ollamaHost: this.chat.ollamaHost,
      timeoutMs: this.chat.timeoutMs,
    });

    let response: LLMResponse;
    try {
      response = await provider.chat(messages, { model, temperature, maxTokens });
    } catch (err) {
      if (err instanceof LLMTimeoutError) {
        return errorResult(`${label} request timed out after ${err.timeoutMs}ms`, ToolErrorCodes.TIMED_OUT);
      }
      const reason = err instanceof LLMProviderError ? err.reason : toErrorMessage(err);
      this.logger.warn(`chat_completion: ${providerName} failed: ${reason}`);
      return errorResult(`${label} API error: ${reason}`);
    }

    this.logger.debug(`chat_completion: ${providerName}/${model} answered`);
    return okResult(formatResponse(providerName, response, region), {
      artifacts: {
        response: response.content,
        usage: response.usage,
        model: response.model,
        provider: providerName,
        ...(providerName === "bedrock" ? { region } : {}),
      },
    });
  }

  private defaultApiKey(provider: ChatProviderName): string | undefined {
    if (provider === "openai") return this.chat.apiKeys.openai;
    if (provider === "anthropic") return this.chat.apiKeys.anthropic;
    return undefined;
  }
}

// ============================================================================
// SimplePromptTool
// ============================================================================

export class SimplePromptTool implements ToolAdapter {
  readonly name = "simple_prompt";
  readonly description = "Generate a simple completion from a single prompt";
  readonly category = "ai";
  readonly actions = ["prompt"] as const;
  readonly defaultAction = "prompt";
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly delegate: ChatCompletionTool;

  constructor(config: ChatToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.delegate = new ChatCompletionTool(config);
    const chat = config.chat ?? defaultToolkitConfig().chat;
    this.parameters = [
      { name: "prompt", type: "string", description: "The prompt to complete", required: true },
      {
        name: "provider",
        type: "string",
        description: "Provider to use: openai, anthropic, bedrock, local",
        required: false,
        default: chat.provider,
      },
      { name: "model", type: "string", description: "Model to use", required: false, default: chat.model },
      { name: "max_tokens", type: "integer", description: "Maximum tokens in response", required: false, default: 500 },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Simple prompt", { prompt: (p) => this.prompt(p) }, action, params, this.logger);
  }

  private async prompt(params: ToolParams): Promise<ToolResult> {
    const prompt = nonEmptyParam(params, "prompt");
    if (prompt === undefined) return missingParameter("prompt is required");

    const result = await this.delegate.execute("complete", {
      messages: [{ role: "user", content: prompt }],
      provider: params.provider,
      model: params.model,
      max_tokens: params.max_tokens ?? 500,
    });
    if (!result.success) return result;

    const response = result.metadata?.artifacts?.response;
    return okResult(typeof response === "string" ? response : (result.output ?? ""));
  }
}
