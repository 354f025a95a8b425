/**
 * Toolkit configuration schema.
 *
 * Every section defaults, so `{}` is a complete configuration.
 *
 * @module
 */

import { z } from 'zod';
import { ToolkitConfigError } from '../types/errors.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const ChatProviderNameSchema = z.enum(['openai', 'anthropic', 'bedrock', 'local']);
export type ChatProviderName = z.infer<typeof ChatProviderNameSchema>;

const positiveSeconds = (fallback: number) => z.number().positive().default(fallback);

export const ToolkitConfigSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    bash: z
      .object({
        timeoutSeconds: positiveSeconds(120),
        cwd: z.string().min(1).optional(),
        maxOutputBytes: z.number().int().positive().default(100_000),
      })
      .default({}),
    codeExecutor: z
      .object({
        timeoutSeconds: positiveSeconds(30),
      })
      .default({}),
    files: z
      .object({
        historyLimit: z.number().int().positive().default(10),
      })
      .default({}),
    web: z
      .object({
        timeoutMs: z.number().int().positive().default(30_000),
        maxResults: z.number().int().positive().default(10),
        region: z.string().min(1).default('us-en'),
        userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
      })
      .default({}),
    browser: z
      .object({
        headless: z.boolean().default(true),
      })
      .default({}),
    vnc: z
      .object({
        executable: z.string().min(1).default('vncdotool'),
        timeoutSeconds: positiveSeconds(15),
      })
      .default({}),
    macos: z
      .object({
        timeoutSeconds: positiveSeconds(30),
      })
      .default({}),
    chat: z
      .object({
        provider: ChatProviderNameSchema.default('openai'),
        model: z.string().min(1).default('gpt-3.5-turbo'),
        temperature: z.number().min(0).max(2).default(0.7),
        maxTokens: z.number().int().positive().default(1000),
        region: z.string().min(1).default('us-east-1'),
        ollamaHost: z.string().url().default('http://localhost:11434'),
        timeoutMs: z.number().int().positive().default(60_000),
        apiKeys: z
          .object({
            openai: z.string().min(1).optional(),
            anthropic: z.string().min(1).optional(),
          })
          .default({}),
      })
      .default({}),
  })
  .strict();

export type ToolkitConfig = z.infer<typeof ToolkitConfigSchema>;
export type ToolkitConfigInput = z.input<typeof ToolkitConfigSchema>;

/**
 * Validate raw input and fill defaults.
 *
 * @throws ToolkitConfigError listing each failing path
 */
export function parseToolkitConfig(raw: unknown): ToolkitConfig {
  const result = ToolkitConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ToolkitConfigError('Invalid toolbelt config', issues);
  }
  return result.data;
}

export function defaultToolkitConfig(): ToolkitConfig {
  return ToolkitConfigSchema.parse({});
}
