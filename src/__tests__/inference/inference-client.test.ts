import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ProviderRegistry,
  type ProviderConfig,
} from "../../inference/provider-registry.js";
import { UnifiedInferenceClient, type ChatMessage } from "../../inference/inference-client.js";
import { LlmError } from "../../errors.js";

const mockState = vi.hoisted(() => {
  const queue: Array<(payload: any, options: any) => unknown | Promise<unknown>> = [];
  const calls: Array<{ payload: any; options: any }> = [];

  const create = vi.fn(async (payload: any, options: any) => {
    calls.push({ payload, options });
    const next = queue.shift();
    if (!next) {
      throw new Error("No OpenAI mock response queued");
    }
    return next(payload, options);
  });

  const ctor = vi.fn().mockImplementation(function MockOpenAI(this: any) {
    this.chat = {
      completions: {
        create,
      },
    };
  });

  return {
    queue,
    calls,
    create,
    ctor,
  };
});

vi.mock("openai", () => ({
  default: mockState.ctor,
}));

const BASE_MESSAGES: ChatMessage[] = [{ role: "user", content: "hello" }];

function createDefaultRegistry(): ProviderRegistry {
  return ProviderRegistry.fromConfig("/tmp/definitely-missing-provider-config.json", {});
}

function createClient(registry = createDefaultRegistry()): UnifiedInferenceClient {
  return new UnifiedInferenceClient(registry);
}

function queueCompletion(params?: {
  content?: unknown;
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void {
  mockState.queue.push(async () => ({
    choices: [
      {
        message: {
          content: params?.content ?? "ok",
        },
      },
    ],
    usage: {
      prompt_tokens: params?.promptTokens ?? 100,
      completion_tokens: params?.completionTokens ?? 20,
      total_tokens: params?.totalTokens ?? 120,
    },
  }));
}

function queueError(status: number, message = `HTTP ${status}`): void {
  mockState.queue.push(async () => {
    const error = new Error(message) as Error & { status?: number };
    error.status = status;
    throw error;
  });
}

function queueHangUntilAborted(): void {
  mockState.queue.push(
    (_payload, options) =>
      new Promise((_resolve, reject) => {
        const signal: AbortSignal = options.signal;
        if (signal.aborted) {
          reject(new Error("aborted"));
          return;
        }
        signal.addEventListener("abort", () => reject(new Error("aborted")));
      }),
  );
}

describe("UnifiedInferenceClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockState.queue.splice(0, mockState.queue.length);
    mockState.calls.splice(0, mockState.calls.length);
  });

  afterAll(() => {
    vi.useRealTimers();
  });

  it("chat resolves tier and returns result", async () => {
    const client = createClient();
    queueCompletion({ content: "reasoning-response" });

    const result = await client.chat({
      tier: "reasoning",
      messages: BASE_MESSAGES,
    });

    expect(result.content).toBe("reasoning-response");
    expect(result.metadata.providerId).toBe("openrouter");
    expect(result.metadata.modelId).toBe("moonshotai/kimi-k2-0905");
    expect(result.metadata.tier).toBe("reasoning");
  });

  it("chat populates failedProviders as empty on first success", async () => {
    const client = createClient();
    queueCompletion();

    const result = await client.chat({ tier: "fast", messages: BASE_MESSAGES });
    expect(result.metadata.failedProviders).toEqual([]);
    expect(result.metadata.retries).toBe(0);
  });

  it("chat retries transient errors and succeeds on the same provider", async () => {
    const client = createClient();
    queueError(429);
    queueError(429);
    queueCompletion({ content: "after-retry" });

    vi.useFakeTimers();
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout");

    const pending = client.chat({ tier: "fast", messages: BASE_MESSAGES });
    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result.content).toBe("after-retry");
    expect(result.metadata.providerId).toBe("openrouter");
    expect(result.metadata.retries).toBe(2);
    const waits = setTimeoutSpy.mock.calls.map((call) => Number(call[1]));
    expect(waits).toEqual([1000, 2000]);

    setTimeoutSpy.mockRestore();
    vi.useRealTimers();
  });

  it.each([429, 500, 503])(
    "fails over to next provider on retryable %s errors",
    async (status) => {
      const client = createClient();

      // openrouter gets 4 failures (3 retries + final failure), then openai succeeds
      queueError(status);
      queueError(status);
      queueError(status);
      queueError(status);
      queueCompletion({ content: `from-openai-${status}` });

      vi.useFakeTimers();
      const pending = client.chat({ tier: "reasoning", messages: BASE_MESSAGES });
      await vi.runAllTimersAsync();
      const result = await pending;
      vi.useRealTimers();

      expect(result.content).toBe(`from-openai-${status}`);
      expect(result.metadata.providerId).toBe("openai");
      expect(result.metadata.failedProviders).toEqual(["openrouter"]);
      expect(result.metadata.retries).toBe(3);
    },
  );

  it("does not fail over on non-retryable provider error", async () => {
    const client = createClient();
    queueError(400, "bad request");

    const error = await client.chat({ tier: "reasoning", messages: BASE_MESSAGES }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ kind: "unavailable", message: "bad request", providerId: "openrouter" });
    expect(mockState.create).toHaveBeenCalledTimes(1);
  });

  it("fails over without retrying when credentials are rejected", async () => {
    const client = createClient();
    queueError(401, "invalid api key");
    queueCompletion({ content: "from-openai" });

    const result = await client.chat({ tier: "cheap", messages: BASE_MESSAGES });

    expect(result.metadata.providerId).toBe("openai");
    expect(result.metadata.failedProviders).toEqual(["openrouter"]);
    expect(result.metadata.retries).toBe(0);
  });

  it("reports unauthorized when every provider rejects credentials", async () => {
    const client = createClient();
    queueError(401);
    queueError(403);

    await expect(client.chat({ tier: "reasoning", messages: BASE_MESSAGES })).rejects.toMatchObject({
      kind: "unauthorized",
      retryable: false,
    });
  });

  it("reports quota exhaustion after the retry budget is spent everywhere", async () => {
    const client = createClient();
    for (let i = 0; i < 8; i += 1) {
      queueError(429, `rate-limited-${i}`);
    }

    vi.useFakeTimers();
    const pending = client.chat({ tier: "reasoning", messages: BASE_MESSAGES }).catch((e: unknown) => e);
    await vi.runAllTimersAsync();
    const error = await pending;
    vi.useRealTimers();

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ kind: "quota_exhausted" });
    expect(String(error)).toMatch(/All providers failed for tier 'reasoning'. Failed providers: openrouter, openai/);
  });

  it("times out a hanging provider and fails over", async () => {
    const client = createClient();
    queueHangUntilAborted();
    queueCompletion({ content: "after-timeout" });

    const result = await client.chat({ tier: "fast", messages: BASE_MESSAGES, timeoutMs: 20 });

    expect(result.content).toBe("after-timeout");
    expect(result.metadata.failedProviders).toEqual(["openrouter"]);
  });

  it("reports timeout when every provider hangs", async () => {
    const client = createClient();
    queueHangUntilAborted();
    queueHangUntilAborted();

    await expect(
      client.chat({ tier: "fast", messages: BASE_MESSAGES, timeoutMs: 20 }),
    ).rejects.toMatchObject({ kind: "timeout" });
  });

  it("rethrows caller cancellation without failing over", async () => {
    const client = createClient();
    const controller = new AbortController();
    controller.abort();
    queueHangUntilAborted();

    await expect(
      client.chat({ tier: "fast", messages: BASE_MESSAGES, signal: controller.signal }),
    ).rejects.toThrow("aborted");
    expect(mockState.create).toHaveBeenCalledTimes(1);
  });

  it("throws when no providers are available for tier", async () => {
    const providers: ProviderConfig[] = [
      {
        id: "p1",
        name: "Disabled",
        baseUrl: "https://example.com/v1",
        apiKeyEnvVar: "P1_KEY",
        models: [
          {
            id: "m1",
            tier: "reasoning",
            maxOutputTokens: 1000,
            costPerInputToken: 0,
            costPerOutputToken: 0,
          },
        ],
        priority: 1,
        enabled: false,
      },
    ];

    const registry = new ProviderRegistry(providers);
    const client = createClient(registry);

    await expect(client.chat({ tier: "reasoning", messages: BASE_MESSAGES })).rejects.toThrow(
      /No providers available/,
    );
  });

  it("circuit breaker skips a provider after 5 consecutive failures", async () => {
    const client = createClient();

    for (let i = 0; i < 5; i += 1) {
      queueError(400, `hard-fail-${i}`);
      await expect(client.chat({ tier: "reasoning", messages: BASE_MESSAGES })).rejects.toThrow(
        `hard-fail-${i}`,
      );
    }

    queueCompletion({ content: "from-fallback" });

    // The open circuit also disables the provider in the registry, so it is not a candidate.
    const result = await client.chat({ tier: "reasoning", messages: BASE_MESSAGES });
    expect(result.metadata.providerId).toBe("openai");
    expect(result.metadata.failedProviders).toEqual([]);
    expect(mockState.create).toHaveBeenCalledTimes(6);
  });

  it("a success resets the consecutive failure count", async () => {
    const client = createClient();

    for (let i = 0; i < 4; i += 1) {
      queueError(400, `fail-${i}`);
      await expect(client.chat({ tier: "fast", messages: BASE_MESSAGES })).rejects.toThrow(`fail-${i}`);
    }

    queueCompletion({ content: "recovered" });
    await client.chat({ tier: "fast", messages: BASE_MESSAGES });

    queueError(400, "one-more");
    await expect(client.chat({ tier: "fast", messages: BASE_MESSAGES })).rejects.toThrow("one-more");

    queueCompletion({ content: "still-openrouter" });
    const result = await client.chat({ tier: "fast", messages: BASE_MESSAGES });
    expect(result.metadata.providerId).toBe("openrouter");
  });

  it("tracks cost fields in result", async () => {
    const client = createClient();
    queueCompletion({
      content: "cost-test",
      promptTokens: 2000,
      completionTokens: 500,
      totalTokens: 2500,
    });

    const result = await client.chat({ tier: "reasoning", messages: BASE_MESSAGES });
    expect(result.usage).toEqual({ inputTokens: 2000, outputTokens: 500, totalTokens: 2500 });
    expect(result.cost.inputCostCredits).toBeCloseTo(1.2); // 2k * 0.6 / 1k
    expect(result.cost.outputCostCredits).toBeCloseTo(1.25); // 0.5k * 2.5 / 1k
    expect(result.cost.totalCostCredits).toBeCloseTo(2.45);
  });

  it("extracts text content from structured content arrays", async () => {
    const client = createClient();
    queueCompletion({
      content: [
        { type: "text", text: "alpha" },
        "-",
        { type: "text", text: "beta" },
      ],
    });

    const result = await client.chat({ tier: "fast", messages: BASE_MESSAGES });
    expect(result.content).toBe("alpha-beta");
  });

  it("throws when provider response has no completion choice", async () => {
    const client = createClient();
    mockState.queue.push(async () => ({ choices: [] }));

    await expect(client.chat({ tier: "reasoning", messages: BASE_MESSAGES })).rejects.toThrow(
      /No completion choice returned from provider 'openrouter'/,
    );
  });

  it("passes sampling and response-format params to the OpenAI payload", async () => {
    const client = createClient();
    queueCompletion({ content: "payload" });

    await client.chat({
      tier: "fast",
      messages: BASE_MESSAGES,
      temperature: 0.2,
      maxTokens: 321,
      responseFormat: { type: "json_object" },
    });

    const call = mockState.calls.at(-1);
    expect(call?.payload).toEqual({
      model: "microsoft/phi-4",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0.2,
      max_tokens: 321,
      response_format: { type: "json_object" },
      stream: false,
    });
    expect(call?.options.signal).toBeInstanceOf(AbortSignal);
  });

  it("clamps maxTokens to the model's output ceiling", async () => {
    const client = createClient();
    queueCompletion();

    await client.chat({ tier: "fast", messages: BASE_MESSAGES, maxTokens: 10_000 });

    expect(mockState.calls.at(-1)?.payload.max_tokens).toBe(4000);
  });
});
