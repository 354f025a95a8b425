import { describe, it, expect } from "vitest";
import { createLLMProvider, isOllamaEndpoint } from "./factory.js";
import { AnthropicProvider } from "./anthropic/index.js";
import { BedrockProvider } from "./bedrock/index.js";
import { OllamaProvider } from "./ollama/index.js";
import { OpenAIProvider } from "./openai/index.js";

describe("isOllamaEndpoint", () => {
  it("treats a missing URL, ollama hosts and port 11434 as Ollama", () => {
    expect(isOllamaEndpoint(undefined)).toBe(true);
    expect(isOllamaEndpoint("http://ollama.internal")).toBe(true);
    expect(isOllamaEndpoint("http://10.0.0.5:11434")).toBe(true);
    expect(isOllamaEndpoint("http://localhost:8000")).toBe(false);
  });
});

describe("createLLMProvider", () => {
  it("builds one adapter per provider name", () => {
    expect(createLLMProvider("openai", {})).toBeInstanceOf(OpenAIProvider);
    expect(createLLMProvider("anthropic", {})).toBeInstanceOf(AnthropicProvider);
    expect(createLLMProvider("bedrock", { region: "us-west-2" })).toMatchObject({ region: "us-west-2" });
    expect(createLLMProvider("local", {})).toBeInstanceOf(OllamaProvider);
  });

  it("routes other local endpoints through the OpenAI adapter", () => {
    const provider = createLLMProvider("local", { baseUrl: "http://localhost:8000/" });
    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider.name).toBe("local");
    expect(createLLMProvider("bedrock", {})).toBeInstanceOf(BedrockProvider);
  });
});
