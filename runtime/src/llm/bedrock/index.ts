/**
 * AWS Bedrock LLM provider module
 *
 * @module
 */

export { BedrockProvider } from "./adapter.js";
export type { BedrockProviderConfig } from "./types.js";
