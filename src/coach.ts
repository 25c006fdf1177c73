/**
 * Growth Coach
 *
 * Composition root. Builds each collaborator once from the loaded config
 * and exposes the turn, status and reset calls a chat surface needs.
 */

import OpenAI from "openai";
import type { GrowthCoachConfig } from "./config.js";
import { ConversationOrchestrator, type TurnInput } from "./conversation/state-machine.js";
import { HttpAutomationBackend, type AutomationBackend } from "./execution/automation-client.js";
import { ExecutionDispatcher } from "./execution/dispatcher.js";
import { createSafetyPolicy } from "./execution/safety-filter.js";
import { UnifiedInferenceClient, type InferenceClient } from "./inference/inference-client.js";
import { ProviderRegistry } from "./inference/provider-registry.js";
import {
  KeywordQueryClassifier,
  LlmQueryClassifier,
  type QueryClassifier,
} from "./inference/query-classifier.js";
import { createLogger } from "./observability/logger.js";
import { ResearchCoordinator } from "./research/coordinator.js";
import { OpenAiEmbedder, type Embedder } from "./research/embedding.js";
import type { FetchLike, ResearchProvider } from "./research/provider.js";
import { createResearchProviders } from "./research/providers/index.js";
import type { KvStore } from "./state/kv-store.js";
import { SessionStore } from "./state/session-store.js";
import { SqliteKvStore } from "./state/sqlite-store.js";
import { createStores, type StoreSet } from "./state/store-factory.js";
import { UserLock } from "./state/user-lock.js";
import { createSpecialists } from "./strategy/specialists.js";
import { StrategySynthesisEngine } from "./strategy/synthesis-engine.js";
import type { ConversationStage, DispatchRecord, SessionError } from "./types.js";

const logger = createLogger("coach");

export type HandleTurnOptions = Omit<TurnInput, "message">;

export interface TurnResponse {
  stage: ConversationStage;
  responseText: string;
  executionId?: string;
  error?: SessionError;
}

/** Collaborators a caller may supply instead of the ones built from config. */
export interface GrowthCoachOverrides {
  stores?: StoreSet;
  backend?: AutomationBackend;
  providers?: ResearchProvider[];
  inference?: InferenceClient | null;
  embedder?: Embedder | null;
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  now?: () => Date;
}

export class GrowthCoach {
  private closing: Promise<void> | null = null;

  constructor(
    private readonly orchestrator: ConversationOrchestrator,
    private readonly dispatcher: ExecutionDispatcher,
    private readonly stores: StoreSet,
  ) {}

  /** Runs one turn. A user's first message starts their session. */
  async handleTurn(userId: string, message: string, options: HandleTurnOptions = {}): Promise<TurnResponse> {
    const result = await this.orchestrator.advance(userId, { create: true, ...options, message });
    return {
      stage: result.stage,
      responseText: result.response,
      ...(result.executionId ? { executionId: result.executionId } : {}),
      ...(result.error ? { error: result.error } : {}),
    };
  }

  async getExecutionStatus(executionId: string): Promise<DispatchRecord[] | null> {
    const set = await this.dispatcher.getStatus(executionId);
    return set ? set.records : null;
  }

  /** Waits for any running turn of the user, then discards the session. */
  resetSession(userId: string): Promise<void> {
    return this.orchestrator.reset(userId);
  }

  /** Waits until an execution has recorded its final state. Used by the CLI and tests. */
  async waitForExecution(executionId: string): Promise<DispatchRecord[] | null> {
    const set = await this.dispatcher.waitForExecution(executionId);
    return set ? set.records : null;
  }

  /** Stops running executions and closes the stores. Safe to call more than once. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.dispatcher.shutdown();
    await this.stores.primary.close();
    await this.stores.localFallback?.close();
  }
}

export async function createGrowthCoach(
  config: GrowthCoachConfig,
  overrides: GrowthCoachOverrides = {},
): Promise<GrowthCoach> {
  const env = overrides.env ?? process.env;
  const stores = overrides.stores ?? await createStores(config.store);
  purgeLocalStores(stores);

  const inference = overrides.inference !== undefined ? overrides.inference : createInference(config, env);
  const classifier: QueryClassifier = inference
    ? new LlmQueryClassifier(inference, { timeoutMs: config.inference.requestTimeoutMs })
    : new KeywordQueryClassifier();

  const research = new ResearchCoordinator({
    store: stores.primary,
    classifier,
    providers: overrides.providers ?? createResearchProviders(config.research.providers, env, overrides.fetch),
    overallTimeoutMs: config.research.overallTimeoutMs,
    minProviders: config.research.minProviders,
    maxSummaryTokens: config.research.maxSummaryTokens,
    embedder: overrides.embedder !== undefined ? overrides.embedder : createEmbedder(config, env),
    now: overrides.now,
  });

  const strategy = new StrategySynthesisEngine({
    specialists: createSpecialists(config.strategy.specialists, config.strategy.useInference ? inference : null),
    timeoutMs: config.strategy.specialistTimeoutMs,
  });

  const dispatcher = new ExecutionDispatcher({
    backend: overrides.backend ?? new HttpAutomationBackend({
      baseUrl: config.dispatcher.baseUrl,
      apiToken: env[config.dispatcher.apiTokenEnvVar],
      requestTimeoutMs: config.dispatcher.requestTimeoutMs,
      fetch: overrides.fetch,
    }),
    store: stores.primary,
    localFallback: stores.localFallback,
    minDelayMs: config.dispatcher.minDelayMs,
    jitterMs: config.dispatcher.jitterMs,
    maxConcurrentPerUser: config.dispatcher.maxConcurrentPerUser,
    maxAttempts: config.dispatcher.maxAttempts,
    backoffBaseMs: config.dispatcher.backoffBaseMs,
    backoffMaxMs: config.dispatcher.backoffMaxMs,
    pollIntervalMs: config.dispatcher.pollIntervalMs,
    pollTimeoutMs: config.dispatcher.pollTimeoutMs,
    now: overrides.now,
  });

  const orchestrator = new ConversationOrchestrator({
    sessions: new SessionStore(stores.primary),
    lock: new UserLock({
      store: stores.primary,
      distributed: config.locking.distributed,
      lockTtlMs: config.locking.lockTtlMs,
      waitTimeoutMs: config.locking.waitTimeoutMs,
    }),
    research,
    strategy,
    dispatcher,
    planner: config.planner,
    safetyPolicy: createSafetyPolicy(config.safety.extraDeniedCategories),
    surfaceDegradedToUser: config.research.surfaceDegradedToUser,
    now: overrides.now,
  });

  logger.info("Growth coach ready", {
    inference: inference !== null,
    specialists: config.strategy.specialists,
    localFallback: stores.localFallback !== null,
  });

  return new GrowthCoach(orchestrator, dispatcher, stores);
}

function createInference(config: GrowthCoachConfig, env: NodeJS.ProcessEnv): InferenceClient | null {
  const registry = ProviderRegistry.fromConfig(config.inference.providersPath, env);
  if (!registry.hasCredentials()) {
    logger.info("No inference credentials, using keyword classifier and playbooks");
    return null;
  }
  return new UnifiedInferenceClient(registry, { defaultTimeoutMs: config.inference.requestTimeoutMs });
}

function createEmbedder(config: GrowthCoachConfig, env: NodeJS.ProcessEnv): Embedder | null {
  const apiKey = env.OPENAI_API_KEY;
  if (!config.research.embeddingModel || !apiKey) {
    return null;
  }
  const client = new OpenAI({ apiKey });
  return new OpenAiEmbedder(client.embeddings, config.research.embeddingModel);
}

function purgeLocalStores(stores: StoreSet): void {
  for (const store of [stores.primary, stores.localFallback]) {
    if (isSqliteStore(store)) {
      const purged = store.purgeExpired();
      if (purged > 0) {
        logger.debug("Purged expired entries", { purged });
      }
    }
  }
}

function isSqliteStore(store: KvStore | null): store is SqliteKvStore {
  return store instanceof SqliteKvStore;
}
