import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockChat, mockAbort, hosts } = vi.hoisted(() => ({
  mockChat: vi.fn(),
  mockAbort: vi.fn(),
  hosts: new Array<string>(),
}));

vi.mock("ollama", () => ({
  Ollama: class MockOllama {
    chat = mockChat;
    abort = mockAbort;
    constructor(opts: { host: string }) {
      hosts.push(opts.host);
    }
  },
}));

import { OllamaProvider } from "./adapter.js";
import { LLMTimeoutError } from "../errors.js";

const options = { model: "llama3", temperature: 0.7, maxTokens: 200 };

describe("OllamaProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    hosts.length = 0;
  });

  it("sends messages with sampling options", async () => {
    mockChat.mockResolvedValueOnce({
      model: "llama3",
      message: { role: "assistant", content: "Hello!" },
      prompt_eval_count: 10,
      eval_count: 5,
    });

    const response = await new OllamaProvider().chat([{ role: "user", content: "Hello" }], options);

    expect(hosts).toEqual(["http://localhost:11434"]);
    expect(mockChat.mock.calls[0][0]).toEqual({
      model: "llama3",
      messages: [{ role: "user", content: "Hello" }],
      stream: false,
      options: { temperature: 0.7, num_predict: 200 },
    });
    expect(response).toEqual({
      content: "Hello!",
      model: "llama3",
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
  });

  it("leaves usage out when the server reports no counts", async () => {
    mockChat.mockResolvedValueOnce({ model: "llama3", message: { role: "assistant", content: "ok" } });
    const response = await new OllamaProvider({ host: "http://gpu-box:11434" }).chat(
      [{ role: "user", content: "x" }],
      options,
    );
    expect(hosts).toEqual(["http://gpu-box:11434"]);
    expect(response.usage).toBeUndefined();
  });

  it("aborts the client when the request times out", async () => {
    mockChat.mockImplementationOnce(() => new Promise(() => undefined));
    const provider = new OllamaProvider({ timeoutMs: 20 });

    await expect(provider.chat([{ role: "user", content: "x" }], options)).rejects.toBeInstanceOf(LLMTimeoutError);
    expect(mockAbort).toHaveBeenCalledOnce();
  });
});
