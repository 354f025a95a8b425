/**
 * @toolbelt/runtime - agent tool catalog
 *
 * Tool adapters over shell, files, web, browser, macOS, VNC and LLM
 * providers; the capability registry that decides which of them this
 * process can offer; and the bridge that hands them to host frameworks.
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './utils/index.js';
export * from './tools/index.js';
export * from './bridges/index.js';
export * from './llm/index.js';

export {
  ToolkitConfigSchema,
  ChatProviderNameSchema,
  DEFAULT_USER_AGENT,
  parseToolkitConfig,
  defaultToolkitConfig,
} from './config/schema.js';
export type { ChatProviderName, ToolkitConfig, ToolkitConfigInput } from './config/schema.js';
export { loadToolkitConfig, resolveConfigPath, applyEnvOverrides, DEFAULT_CONFIG_FILE } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';

export { runCli, parseArgv } from './cli/index.js';
export type { CliRunOptions, CliStatusCode } from './cli/types.js';
