/**
 * AWS Bedrock provider configuration types
 *
 * @module
 */

/**
 * Configuration for the Bedrock Converse provider. Credentials come from the
 * default AWS provider chain.
 */
export interface BedrockProviderConfig {
  /** AWS region (default: 'us-east-1') */
  region?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}
