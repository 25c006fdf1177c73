import type OpenAI from "openai";
import { LlmError, isAbortError, type LlmErrorKind } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import {
  ProviderRegistry,
  type ModelTier,
  type ModelConfig,
  type ResolvedModel,
} from "./provider-registry.js";

const logger = createLogger("inference.client");

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503]);
const UNAUTHORIZED_STATUS_CODES = new Set([401, 403]);
const RETRY_BACKOFF_MS = [1000, 2000, 4000] as const;
const CIRCUIT_BREAKER_FAILURE_THRESHOLD = 5;
const CIRCUIT_BREAKER_DISABLE_MS = 5 * 60_000;
const DEFAULT_TIMEOUT_MS = 30_000;

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface UnifiedInferenceResult {
  content: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  cost: {
    inputCostCredits: number;
    outputCostCredits: number;
    totalCostCredits: number;
  };
  metadata: {
    providerId: string;
    modelId: string;
    tier: ModelTier;
    latencyMs: number;
    retries: number;
    failedProviders: string[];
  };
}

export interface UnifiedChatParams {
  tier: ModelTier;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  responseFormat?: { type: "json_object" | "text" };
  /** Per-request bound; a request still running after it fails over as a timeout. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** The slice of the client that classifiers and specialists depend on. */
export interface InferenceClient {
  chat(params: UnifiedChatParams): Promise<UnifiedInferenceResult>;
}

interface CircuitBreakerState {
  failures: number;
  disabledUntil: number;
}

interface AttemptResult {
  result: UnifiedInferenceResult;
  retries: number;
}

class ProviderAttemptError extends Error {
  readonly providerId: string;
  readonly retries: number;
  readonly kind: LlmErrorKind;
  /** Whether the next provider in the tier may be tried. */
  readonly failover: boolean;

  constructor(params: {
    providerId: string;
    retries: number;
    kind: LlmErrorKind;
    failover: boolean;
    originalError: unknown;
  }) {
    const message =
      params.originalError instanceof Error
        ? params.originalError.message
        : String(params.originalError);
    super(message);

    this.providerId = params.providerId;
    this.retries = params.retries;
    this.kind = params.kind;
    this.failover = params.failover;
  }
}

export class UnifiedInferenceClient implements InferenceClient {
  private readonly registry: ProviderRegistry;
  private readonly circuitBreaker = new Map<string, CircuitBreakerState>();
  private readonly defaultTimeoutMs: number;

  constructor(registry: ProviderRegistry, options: { defaultTimeoutMs?: number } = {}) {
    this.registry = registry;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async chat(params: UnifiedChatParams): Promise<UnifiedInferenceResult> {
    const candidates = this.registry.resolveCandidates(params.tier);
    if (candidates.length === 0) {
      throw new LlmError("unavailable", `No providers available for tier '${params.tier}'`);
    }

    const failedProviders: string[] = [];
    const failureKinds: LlmErrorKind[] = [];
    let totalRetries = 0;

    for (const resolved of candidates) {
      if (this.isProviderCircuitOpen(resolved.provider.id)) {
        failedProviders.push(resolved.provider.id);
        continue;
      }

      try {
        const attempt = await this.executeWithRetries(resolved, params);
        this.markProviderSuccess(resolved.provider.id);

        return {
          ...attempt.result,
          metadata: {
            ...attempt.result.metadata,
            retries: totalRetries + attempt.retries,
            failedProviders,
          },
        };
      } catch (error) {
        if (!(error instanceof ProviderAttemptError)) {
          throw error;
        }

        totalRetries += error.retries;
        failedProviders.push(resolved.provider.id);
        failureKinds.push(error.kind);
        this.markProviderFailure(resolved.provider.id);
        logger.warn("Inference provider failed", {
          providerId: resolved.provider.id,
          tier: params.tier,
          kind: error.kind,
          error: error.message,
        });

        if (error.failover) {
          continue;
        }

        throw new LlmError(error.kind, error.message, error.providerId);
      }
    }

    throw new LlmError(
      summarizeFailureKinds(failureKinds),
      `All providers failed for tier '${params.tier}'. Failed providers: ${failedProviders.join(", ")}`,
    );
  }

  private async executeWithRetries(
    resolved: ResolvedModel,
    params: UnifiedChatParams,
  ): Promise<AttemptResult> {
    let retries = 0;

    while (true) {
      const timeoutMs = params.timeoutMs ?? this.defaultTimeoutMs;
      const timeoutSignal = AbortSignal.timeout(timeoutMs);
      const signal = params.signal ? AbortSignal.any([params.signal, timeoutSignal]) : timeoutSignal;

      try {
        const result = await this.executeSingleRequest(
          resolved.client,
          resolved.provider.id,
          resolved.model,
          params,
          signal,
        );
        return { result, retries };
      } catch (error) {
        if (params.signal?.aborted) {
          throw error;
        }

        if (timeoutSignal.aborted || isAbortError(error)) {
          throw new ProviderAttemptError({
            providerId: resolved.provider.id,
            retries,
            kind: "timeout",
            failover: true,
            originalError: new Error(`Request to '${resolved.provider.id}' timed out after ${timeoutMs}ms`),
          });
        }

        const status = getStatusCode(error);
        if (status !== undefined && UNAUTHORIZED_STATUS_CODES.has(status)) {
          throw new ProviderAttemptError({
            providerId: resolved.provider.id,
            retries,
            kind: "unauthorized",
            failover: true,
            originalError: error,
          });
        }

        const retryable = status !== undefined && RETRYABLE_STATUS_CODES.has(status);
        if (!retryable) {
          throw new ProviderAttemptError({
            providerId: resolved.provider.id,
            retries,
            kind: "unavailable",
            failover: false,
            originalError: error,
          });
        }

        if (retries >= RETRY_BACKOFF_MS.length) {
          throw new ProviderAttemptError({
            providerId: resolved.provider.id,
            retries,
            kind: status === 429 ? "quota_exhausted" : "unavailable",
            failover: true,
            originalError: error,
          });
        }

        const delayMs = RETRY_BACKOFF_MS[retries];
        retries += 1;
        await sleep(delayMs);
      }
    }
  }

  private async executeSingleRequest(
    client: OpenAI,
    providerId: string,
    model: ModelConfig,
    params: UnifiedChatParams,
    signal: AbortSignal,
  ): Promise<UnifiedInferenceResult> {
    const startedAt = Date.now();
    const completion = await client.chat.completions.create(
      {
        model: model.id,
        messages: params.messages.map((message) => ({ role: message.role, content: message.content })),
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        ...(params.maxTokens !== undefined
          ? { max_tokens: Math.min(params.maxTokens, model.maxOutputTokens) }
          : {}),
        ...(params.responseFormat !== undefined ? { response_format: params.responseFormat } : {}),
        stream: false,
      },
      { signal },
    );

    const choice = completion.choices?.[0];
    if (!choice?.message) {
      throw new Error(`No completion choice returned from provider '${providerId}'`);
    }

    return this.buildUnifiedResult({
      providerId,
      model,
      requestedTier: params.tier,
      latencyMs: Date.now() - startedAt,
      content: extractText(choice.message.content),
      usage: {
        inputTokens: completion.usage?.prompt_tokens ?? 0,
        outputTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    });
  }

  private buildUnifiedResult(params: {
    providerId: string;
    model: ModelConfig;
    requestedTier: ModelTier;
    latencyMs: number;
    content: string;
    usage: {
      inputTokens: number;
      outputTokens: number;
      totalTokens: number;
    };
  }): UnifiedInferenceResult {
    const inputCostCredits = (params.usage.inputTokens / 1000) * params.model.costPerInputToken;
    const outputCostCredits = (params.usage.outputTokens / 1000) * params.model.costPerOutputToken;

    return {
      content: params.content,
      usage: params.usage,
      cost: {
        inputCostCredits,
        outputCostCredits,
        totalCostCredits: inputCostCredits + outputCostCredits,
      },
      metadata: {
        providerId: params.providerId,
        modelId: params.model.id,
        tier: params.requestedTier,
        latencyMs: params.latencyMs,
        retries: 0,
        failedProviders: [],
      },
    };
  }

  private isProviderCircuitOpen(providerId: string): boolean {
    const state = this.circuitBreaker.get(providerId);
    if (!state) {
      return false;
    }

    if (state.disabledUntil > Date.now()) {
      return true;
    }

    if (state.disabledUntil > 0) {
      this.circuitBreaker.set(providerId, {
        failures: 0,
        disabledUntil: 0,
      });
      this.registry.enableProvider(providerId);
    }

    return false;
  }

  private markProviderFailure(providerId: string): void {
    const state = this.circuitBreaker.get(providerId) ?? {
      failures: 0,
      disabledUntil: 0,
    };

    state.failures += 1;

    if (state.failures >= CIRCUIT_BREAKER_FAILURE_THRESHOLD) {
      state.disabledUntil = Date.now() + CIRCUIT_BREAKER_DISABLE_MS;
      this.registry.disableProvider(
        providerId,
        "circuit-breaker: too many consecutive inference failures",
        CIRCUIT_BREAKER_DISABLE_MS,
      );
      logger.warn("Circuit opened for inference provider", { providerId });
    }

    this.circuitBreaker.set(providerId, state);
  }

  private markProviderSuccess(providerId: string): void {
    this.circuitBreaker.set(providerId, {
      failures: 0,
      disabledUntil: 0,
    });
    this.registry.enableProvider(providerId);
  }
}

/**
 * Credentials are only the cause when every provider rejected them; a quota
 * failure anywhere outranks a timeout.
 */
function summarizeFailureKinds(kinds: LlmErrorKind[]): LlmErrorKind {
  if (kinds.length > 0 && kinds.every((kind) => kind === "unauthorized")) {
    return "unauthorized";
  }
  if (kinds.includes("quota_exhausted")) {
    return "quota_exhausted";
  }
  if (kinds.includes("timeout")) {
    return "timeout";
  }
  return "unavailable";
}

function extractText(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }

  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }

        if (part && typeof part === "object" && "type" in part && part.type === "text" && "text" in part) {
          return typeof part.text === "string" ? part.text : "";
        }

        return "";
      })
      .join("");
  }

  return "";
}

function getStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }

  const candidate = error as {
    status?: unknown;
    response?: { status?: unknown };
    cause?: { status?: unknown };
  };

  if (typeof candidate.status === "number") {
    return candidate.status;
  }

  if (typeof candidate.response?.status === "number") {
    return candidate.response.status;
  }

  if (typeof candidate.cause?.status === "number") {
    return candidate.cause.status;
  }

  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
