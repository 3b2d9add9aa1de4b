import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AgentError, AgentMessage } from "@shared/coordination";

const { anthropicCreate, openaiCreate, generateContent, getGenerativeModel } = vi.hoisted(() => {
  const generateContent = vi.fn();
  return {
    anthropicCreate: vi.fn(),
    openaiCreate: vi.fn(),
    generateContent,
    getGenerativeModel: vi.fn(() => ({ generateContent })),
  };
});

// Mock the SDKs
vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: anthropicCreate };
  },
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: openaiCreate } };
  },
}));

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = getGenerativeModel;
  },
}));

import { ClaudeProvider } from "../providers/claude";
import { OpenAIProvider } from "../providers/openai";
import { GeminiProvider } from "../providers/gemini";
import { createConfiguredProviders } from "../providers";
import { getErrorCode, isRetryableError, withRetries } from "../providers/retry";

class StatusError extends Error {
  constructor(
    public status: number,
    message: string,
  ) {
    super(message);
  }
}

const sampleMessages: AgentMessage[] = [
  { role: "user", content: "--- POD STATUS ---\nPhase: Running", timestamp: 1 },
];

describe("ClaudeProvider", () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    process.env.ANTHROPIC_API_KEY = "test-api-key";
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("should throw without an API key", () => {
    delete process.env.ANTHROPIC_API_KEY;
    expect(() => new ClaudeProvider()).toThrow(AgentError);
  });

  it("sends the system prompt as a cached block and joins text blocks", async () => {
    anthropicCreate.mockResolvedValueOnce({
      content: [
        { type: "text", text: "OOM_" },
        { type: "tool_use", id: "t1", name: "x", input: {} },
        { type: "text", text: "KILLED" },
      ],
    });

    const provider = new ClaudeProvider();
    const text = await provider.complete({
      systemPrompt: "Classify the anomaly.",
      messages: sampleMessages,
      modelPreferences: { model: "claude-3-5-haiku-20241022", maxTokens: 64, temperature: 0 },
    });

    expect(text).toBe("OOM_KILLED");
    expect(anthropicCreate).toHaveBeenCalledWith({
      model: "claude-3-5-haiku-20241022",
      max_tokens: 64,
      temperature: 0,
      messages: [{ role: "user", content: "--- POD STATUS ---\nPhase: Running" }],
      system: [
        { type: "text", text: "Classify the anomaly.", cache_control: { type: "ephemeral" } },
      ],
    });
  });

  it("falls back to the default model and sampling", async () => {
    anthropicCreate.mockResolvedValueOnce({ content: [{ type: "text", text: "ok" }] });

    await new ClaudeProvider().complete({ messages: sampleMessages });

    expect(anthropicCreate).toHaveBeenCalledWith({
      model: "claude-sonnet-4-5-20250929",
      max_tokens: 4096,
      temperature: 0.2,
      messages: [{ role: "user", content: "--- POD STATUS ---\nPhase: Running" }],
    });
  });

  it("wraps non-retryable API errors in AgentError", async () => {
    anthropicCreate.mockRejectedValueOnce(new StatusError(401, "invalid x-api-key"));

    const error = await new ClaudeProvider()
      .complete({ messages: sampleMessages })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AgentError);
    expect(error).toMatchObject({
      code: "UNAUTHORIZED",
      message: "Claude (Anthropic): invalid x-api-key",
      retryable: false,
      statusCode: 401,
    });
    expect(anthropicCreate).toHaveBeenCalledTimes(1);
  });
});

describe("OpenAIProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("prepends the system prompt as a system message", async () => {
    openaiCreate.mockResolvedValueOnce({
      choices: [{ message: { content: "Root cause: heap exhaustion" } }],
    });

    const provider = new OpenAIProvider("test-api-key");
    const text = await provider.complete({
      systemPrompt: "You are the analyst.",
      messages: sampleMessages,
    });

    expect(text).toBe("Root cause: heap exhaustion");
    expect(openaiCreate).toHaveBeenCalledWith({
      model: "gpt-4.1",
      max_completion_tokens: 4096,
      temperature: 0.2,
      messages: [
        { role: "system", content: "You are the analyst." },
        { role: "user", content: "--- POD STATUS ---\nPhase: Running" },
      ],
    });
  });

  it("returns an empty string when there is no choice", async () => {
    openaiCreate.mockResolvedValueOnce({ choices: [] });
    await expect(
      new OpenAIProvider("test-api-key").complete({ messages: sampleMessages }),
    ).resolves.toBe("");
  });
});

describe("GeminiProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("passes the system instruction and maps assistant turns to model", async () => {
    generateContent.mockResolvedValueOnce({ response: { text: () => "HEALTHY" } });

    const provider = new GeminiProvider("test-api-key");
    const text = await provider.complete({
      systemPrompt: "Classify.",
      messages: [
        { role: "user", content: "context" },
        { role: "assistant", content: "previous" },
      ],
      modelPreferences: { temperature: 0, maxTokens: 64 },
    });

    expect(text).toBe("HEALTHY");
    expect(getGenerativeModel).toHaveBeenCalledWith({
      model: "gemini-2.5-flash",
      systemInstruction: "Classify.",
      generationConfig: { temperature: 0, maxOutputTokens: 64 },
    });
    expect(generateContent).toHaveBeenCalledWith({
      contents: [
        { role: "user", parts: [{ text: "context" }] },
        { role: "model", parts: [{ text: "previous" }] },
      ],
    });
  });
});

describe("createConfiguredProviders", () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    delete process.env.ANTHROPIC_API_KEY;
    delete process.env.OPENAI_API_KEY;
    delete process.env.GOOGLE_API_KEY;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns an empty map without credentials", () => {
    expect(createConfiguredProviders().size).toBe(0);
  });

  it("creates only the providers with keys", () => {
    process.env.GOOGLE_API_KEY = "test-api-key";
    const providers = createConfiguredProviders({ claudeApiKey: "test-api-key" });

    expect(Array.from(providers.keys())).toEqual(["claude", "gemini"]);
  });
});

describe("retry helpers", () => {
  it("classifies retryable failures", () => {
    expect(isRetryableError(new StatusError(429, "slow down"))).toBe(true);
    expect(isRetryableError(new StatusError(503, "unavailable"))).toBe(true);
    expect(isRetryableError(new StatusError(400, "bad request"))).toBe(false);
    expect(isRetryableError(new Error("socket ECONNRESET"))).toBe(true);
    expect(isRetryableError("boom")).toBe(false);
  });

  it("maps errors to codes", () => {
    expect(getErrorCode(new StatusError(429, "x"))).toBe("RATE_LIMITED");
    expect(getErrorCode(new StatusError(502, "x"))).toBe("SERVER_ERROR");
    expect(getErrorCode(new StatusError(418, "x"))).toBe("API_ERROR");
    expect(getErrorCode(new Error("request timeout"))).toBe("TIMEOUT");
    expect(getErrorCode(new Error("other"))).toBe("UNKNOWN_ERROR");
  });

  it("retries retryable failures until the call succeeds", async () => {
    const call = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new StatusError(503, "unavailable"))
      .mockResolvedValueOnce("done");

    await expect(withRetries("Test", call, { retryDelayMs: 0 })).resolves.toBe("done");
    expect(call).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxRetries", async () => {
    const call = vi.fn<() => Promise<string>>().mockRejectedValue(new StatusError(429, "slow down"));

    await expect(
      withRetries("Test", call, { maxRetries: 2, retryDelayMs: 0 }),
    ).rejects.toMatchObject({ code: "RATE_LIMITED", retryable: true, message: "Test: slow down" });
    expect(call).toHaveBeenCalledTimes(3);
  });
});
