import { afterEach, describe, expect, it, vi } from "vitest";
import Anthropic from "@anthropic-ai/sdk";
import { createAnthropicCompletion } from "../lib/llm/client";

const { create, constructed } = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return { create: vi.fn(), constructed };
});

vi.mock("@anthropic-ai/sdk", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@anthropic-ai/sdk")>();
  class MockAnthropic {
    static APIError = actual.default.APIError;
    static APIConnectionError = actual.default.APIConnectionError;
    messages = { create };
    constructor(options: unknown) {
      constructed.push(options);
    }
  }
  return { default: MockAnthropic };
});

vi.mock("../lib/config", () => ({
  config: {
    anthropicApiKey: "test-key",
    llmModel: "test-model",
    llmMaxTokens: 100,
    llmTemperature: 0,
  },
}));

describe("createAnthropicCompletion", () => {
  afterEach(() => {
    create.mockReset();
  });

  it("turns off the client's own retries", () => {
    createAnthropicCompletion();

    expect(constructed).toEqual([{ apiKey: "test-key", maxRetries: 0 }]);
  });

  it("sends one user message and joins the text blocks of the reply", async () => {
    create.mockResolvedValue({
      content: [
        { type: "text", text: "[" },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: "]" },
      ],
    });
    const complete = createAnthropicCompletion();

    await expect(complete("hello")).resolves.toBe("[]");
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 100,
      temperature: 0,
      messages: [{ role: "user", content: "hello" }],
    });
  });

  it("sends a repeated prompt again", async () => {
    create.mockResolvedValue({ content: [{ type: "text", text: "reply" }] });
    const complete = createAnthropicCompletion();

    await complete("same prompt");
    await complete("same prompt");

    expect(create).toHaveBeenCalledTimes(2);
  });

  it("propagates API errors to the caller", async () => {
    create.mockRejectedValue(new Anthropic.APIConnectionError({ message: "socket hang up" }));
    const complete = createAnthropicCompletion();

    await expect(complete("hello")).rejects.toThrow("socket hang up");
  });
});
