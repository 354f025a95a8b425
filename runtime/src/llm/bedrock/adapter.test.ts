import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockSend, regions } = vi.hoisted(() => ({ mockSend: vi.fn(), regions: new Array<string>() }));

vi.mock("@aws-sdk/client-bedrock-runtime", () => ({
  BedrockRuntimeClient: class MockClient {
    send = mockSend;
    constructor(opts: { region: string }) {
      regions.push(opts.region);
    }
  },
  ConverseCommand: class MockConverseCommand {
    constructor(readonly input: unknown) {}
  },
}));

import { BedrockProvider } from "./adapter.js";

describe("BedrockProvider", () => {
  beforeEach(() => {
    mockSend.mockReset();
    regions.length = 0;
  });

  it("builds a Converse request and reads text blocks", async () => {
    mockSend.mockResolvedValueOnce({
      output: { message: { role: "assistant", content: [{ text: "Bonjour" }] } },
      usage: { inputTokens: 9, outputTokens: 2, totalTokens: 11 },
    });

    const provider = new BedrockProvider({ region: "eu-west-1" });
    const response = await provider.chat(
      [
        { role: "system", content: "Answer in French." },
        { role: "user", content: "Hello" },
      ],
      { model: "anthropic.claude-test-v1:0", temperature: 0.3, maxTokens: 50 },
    );

    expect(regions).toEqual(["eu-west-1"]);
    expect(mockSend.mock.calls[0][0]).toEqual({
      input: {
        modelId: "anthropic.claude-test-v1:0",
        messages: [{ role: "user", content: [{ text: "Hello" }] }],
        system: [{ text: "Answer in French." }],
        inferenceConfig: { maxTokens: 50, temperature: 0.3 },
      },
    });
    expect(response).toEqual({
      content: "Bonjour",
      model: "anthropic.claude-test-v1:0",
      usage: { promptTokens: 9, completionTokens: 2, totalTokens: 11 },
    });
  });

  it("maps SDK failures to provider errors", async () => {
    mockSend.mockRejectedValueOnce(new Error("AccessDeniedException"));
    const provider = new BedrockProvider();
    await expect(
      provider.chat([{ role: "user", content: "x" }], { model: "m", temperature: 0, maxTokens: 1 }),
    ).rejects.toMatchObject({ message: "bedrock error: AccessDeniedException", providerName: "bedrock" });
    expect(provider.region).toBe("us-east-1");
  });
});
