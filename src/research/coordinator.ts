/**
 * Research Fan-out Coordinator
 *
 * Answers a research query from the content-keyed cache or by querying
 * every configured provider concurrently. Each provider is bounded by its
 * own timeout and the whole fan-out by an overall one; whatever arrived by
 * then is ranked, summarized and cached for the intent's TTL. Too few
 * answering providers marks the result degraded and mixes in simulated
 * insights. Identical in-flight queries share one fan-out.
 */

import { ProviderError, TurnCancelledError, normalizeError } from "../errors.js";
import {
  classifyByKeywords,
  ttlForIntent,
  type QueryClassifier,
} from "../inference/query-classifier.js";
import { createLogger } from "../observability/logger.js";
import { getJson, setJson, type KvStore } from "../state/kv-store.js";
import type { QueryIntent, ResearchInsight, ResearchResult } from "../types.js";
import { raceAbort, withTimeout } from "../utils/abort.js";
import { rerankInsights, type Embedder } from "./embedding.js";
import type { ResearchProvider } from "./provider.js";
import { SimulatedProvider } from "./providers/simulated.js";
import { fingerprintQuery, researchCacheKey } from "./query.js";
import { rankInsights, synthesizeSummary } from "./synthesis.js";

const logger = createLogger("research.coordinator");

export interface ResearchCoordinatorOptions {
  store: KvStore;
  classifier: QueryClassifier;
  providers: ResearchProvider[];
  overallTimeoutMs: number;
  minProviders: number;
  maxSummaryTokens: number;
  fallbackProvider?: ResearchProvider;
  embedder?: Embedder | null;
  now?: () => Date;
}

interface InFlightResearch {
  promise: Promise<ResearchResult>;
  controller: AbortController;
  waiters: number;
}

interface ProviderOutcome {
  provider: ResearchProvider;
  insights: ResearchInsight[] | null;
  error: Error | null;
}

export class ResearchCoordinator {
  private readonly inFlight = new Map<string, InFlightResearch>();
  private readonly fallbackProvider: ResearchProvider;
  private readonly now: () => Date;
  private readonly rankByProvider: Map<string, number>;

  constructor(private readonly options: ResearchCoordinatorOptions) {
    for (const provider of options.providers) {
      if (provider.timeoutMs >= options.overallTimeoutMs) {
        throw new Error(
          `Provider '${provider.name}' timeout (${provider.timeoutMs}ms) must be below the overall research timeout (${options.overallTimeoutMs}ms)`,
        );
      }
    }

    this.now = options.now ?? (() => new Date());
    this.fallbackProvider = options.fallbackProvider ?? new SimulatedProvider(this.now);
    this.rankByProvider = new Map(
      [...options.providers, this.fallbackProvider].map((provider) => [provider.name, provider.priority]),
    );
  }

  async research(query: string, opts: { signal?: AbortSignal } = {}): Promise<ResearchResult> {
    const fingerprint = fingerprintQuery(query);

    const cached = await this.readCache(fingerprint);
    if (cached) {
      logger.debug("Research cache hit", { fingerprint, intent: cached.intent });
      return cached;
    }

    if (opts.signal?.aborted) {
      throw new TurnCancelledError("researching");
    }

    let flight = this.inFlight.get(fingerprint);
    if (flight) {
      logger.debug("Joining in-flight research", { fingerprint });
    } else {
      logger.debug("Research cache miss", { fingerprint });
      const controller = new AbortController();
      const promise = this.fanOut(query, fingerprint, controller.signal).finally(() => {
        if (this.inFlight.get(fingerprint) === created) {
          this.inFlight.delete(fingerprint);
        }
      });
      const created: InFlightResearch = { promise, controller, waiters: 0 };
      this.inFlight.set(fingerprint, created);
      flight = created;
    }
    return this.wait(flight, opts.signal);
  }

  /**
   * Each caller cancels only its own wait. The shared fan-out is aborted
   * once every caller waiting on it has cancelled.
   */
  private async wait(flight: InFlightResearch, signal: AbortSignal | undefined): Promise<ResearchResult> {
    flight.waiters += 1;
    try {
      if (!signal) {
        return await flight.promise;
      }
      return await raceAbort(flight.promise, signal, () => new TurnCancelledError("researching"));
    } finally {
      flight.waiters -= 1;
      if (flight.waiters === 0 && signal?.aborted) {
        flight.controller.abort();
      }
    }
  }

  private async fanOut(query: string, fingerprint: string, signal: AbortSignal): Promise<ResearchResult> {
    const startedAt = Date.now();
    const fanOutSignal = withTimeout(signal, this.options.overallTimeoutMs);
    const intent = await this.classify(query, fanOutSignal);

    const outcomes = await Promise.all(
      this.options.providers.map((provider) => this.callProvider(provider, query, fanOutSignal)),
    );

    if (signal.aborted) {
      throw new TurnCancelledError("researching");
    }

    const succeeded = outcomes.filter((outcome) => outcome.insights !== null);
    const failed = outcomes.filter((outcome) => outcome.error !== null);
    for (const outcome of failed) {
      logger.warn("Research provider failed", {
        fingerprint,
        provider: outcome.provider.name,
        error: outcome.error?.message,
      });
    }

    let insights = succeeded.flatMap((outcome) => outcome.insights ?? []);
    const degraded = succeeded.length < this.options.minProviders || insights.length === 0;

    if (degraded) {
      logger.warn("Research degraded, adding simulated insights", {
        fingerprint,
        succeeded: succeeded.length,
        required: this.options.minProviders,
      });
      insights = [...insights, ...(await this.fallbackInsights(query))];
    }

    let ranked = rankInsights(insights, (name) => this.rankByProvider.get(name) ?? Number.MAX_SAFE_INTEGER);
    let reranked = false;
    if (this.options.embedder) {
      try {
        ranked = await rerankInsights(this.options.embedder, query, ranked, fanOutSignal);
        reranked = true;
      } catch (error) {
        logger.warn("Embedding re-rank failed, keeping confidence order", {
          fingerprint,
          error: normalizeError(error).message,
        });
      }
    }

    const ttlSeconds = ttlForIntent(intent);
    const result: ResearchResult = {
      queryFingerprint: fingerprint,
      query,
      intent,
      insights: ranked,
      degraded,
      synthesizedSummary: synthesizeSummary(ranked, this.options.maxSummaryTokens),
      providersSucceeded: succeeded.map((outcome) => outcome.provider.name),
      providersFailed: failed.map((outcome) => outcome.provider.name),
      reranked,
      cachedAt: this.now().toISOString(),
      ttlSeconds,
    };

    await this.writeCache(result);

    logger.info("Research fan-out complete", {
      fingerprint,
      intent,
      insights: ranked.length,
      succeeded: result.providersSucceeded,
      failed: result.providersFailed,
      degraded,
      durationMs: Date.now() - startedAt,
    });

    return result;
  }

  /** Classification shares the fan-out deadline; a late or failed label falls back to the keyword rules. */
  private async classify(query: string, signal: AbortSignal): Promise<QueryIntent> {
    try {
      return await raceAbort(
        this.options.classifier.classify(query, signal),
        signal,
        () => new Error("Query classification timed out"),
      );
    } catch (error) {
      logger.warn("Query classification failed, using keyword rules", { error: normalizeError(error).message });
      return classifyByKeywords(query);
    }
  }

  private async callProvider(
    provider: ResearchProvider,
    query: string,
    fanOutSignal: AbortSignal,
  ): Promise<ProviderOutcome> {
    const signal = withTimeout(fanOutSignal, provider.timeoutMs);
    try {
      const insights = await raceAbort(
        provider.search(query, signal),
        signal,
        () => new ProviderError(provider.name, "timed out", { timedOut: true }),
      );
      return { provider, insights, error: null };
    } catch (error) {
      return { provider, insights: null, error: normalizeError(error) };
    }
  }

  private async fallbackInsights(query: string): Promise<ResearchInsight[]> {
    try {
      const insights = await this.fallbackProvider.search(
        query,
        AbortSignal.timeout(this.fallbackProvider.timeoutMs),
      );
      return insights.map((insight) => ({ ...insight, simulated: true }));
    } catch (error) {
      logger.error("Fallback research provider failed", normalizeError(error), { query });
      return [];
    }
  }

  private async readCache(fingerprint: string): Promise<ResearchResult | null> {
    try {
      return await getJson(this.options.store, researchCacheKey(fingerprint), parseResearchResult);
    } catch (error) {
      logger.warn("Research cache read failed, treating as miss", {
        fingerprint,
        error: normalizeError(error).message,
      });
      return null;
    }
  }

  private async writeCache(result: ResearchResult): Promise<void> {
    try {
      await setJson(this.options.store, researchCacheKey(result.queryFingerprint), result, result.ttlSeconds);
    } catch (error) {
      logger.warn("Research cache write failed", {
        fingerprint: result.queryFingerprint,
        error: normalizeError(error).message,
      });
    }
  }
}

function parseResearchResult(value: unknown): ResearchResult {
  if (!isResearchResult(value)) {
    throw new Error("cached research result has an unexpected shape");
  }
  return value;
}

function isResearchResult(value: unknown): value is ResearchResult {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.queryFingerprint === "string" &&
    typeof candidate.synthesizedSummary === "string" &&
    typeof candidate.degraded === "boolean" &&
    Array.isArray(candidate.insights)
  );
}
