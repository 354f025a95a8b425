/**
 * LLM provider types for @toolbelt/runtime
 *
 * Defines the chat interface every provider adapter implements and the
 * OpenAI-format tool spec produced by the bridge.
 *
 * @module
 */

/**
 * Message role in a conversation
 */
export type MessageRole = "system" | "user" | "assistant";

export const MESSAGE_ROLES: readonly MessageRole[] = ["system", "user", "assistant"];

/**
 * A single message in an LLM conversation.
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * Tool definition in OpenAI-compatible format
 */
export interface LLMTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/**
 * Token usage statistics
 */
export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Sampling settings for one completion
 */
export interface LLMRequestOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Response from an LLM provider
 */
export interface LLMResponse {
  content: string;
  model: string;
  /** Absent when the provider reports no counts */
  usage?: LLMUsage;
}

/**
 * Core LLM provider interface that all adapters implement
 */
export interface LLMProvider {
  readonly name: string;
  chat(messages: LLMMessage[], options: LLMRequestOptions): Promise<LLMResponse>;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

export function toUsage(promptTokens: number, completionTokens: number, totalTokens?: number): LLMUsage {
  return { promptTokens, completionTokens, totalTokens: totalTokens ?? promptTokens + completionTokens };
}
