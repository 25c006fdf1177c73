/**
 * Configuration
 *
 * Reads an optional growth-coach.json, merges it over the defaults and
 * normalizes every field. Environment variables override secrets and
 * endpoints.
 */

import fs from "node:fs";
import path from "node:path";
import { isLogLevel, type LogLevel } from "./observability/logger.js";
import { SPECIALIST_IDS, type SpecialistId } from "./types.js";

export interface ResearchProviderSettings {
  id: "tavily" | "serpapi" | "apify";
  enabled: boolean;
  priority: number;
  timeoutMs: number;
  apiKeyEnvVar: string;
  baseUrl: string;
}

export interface GrowthCoachConfig {
  logLevel: LogLevel;
  store: {
    redisUrl: string | null;
    dataDir: string;
    connectTimeoutMs: number;
  };
  research: {
    providers: ResearchProviderSettings[];
    overallTimeoutMs: number;
    minProviders: number;
    maxSummaryTokens: number;
    surfaceDegradedToUser: boolean;
    embeddingModel: string | null;
  };
  strategy: {
    specialists: SpecialistId[];
    specialistTimeoutMs: number;
    useInference: boolean;
  };
  planner: {
    minSpacingMinutes: number;
    maxLikesPerHour: number;
    maxFollowsPerHour: number;
  };
  safety: {
    extraDeniedCategories: string[];
  };
  dispatcher: {
    baseUrl: string;
    apiTokenEnvVar: string;
    requestTimeoutMs: number;
    minDelayMs: number;
    jitterMs: number;
    maxConcurrentPerUser: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    pollIntervalMs: number;
    pollTimeoutMs: number;
  };
  locking: {
    distributed: boolean;
    lockTtlMs: number;
    waitTimeoutMs: number;
  };
  inference: {
    providersPath: string | null;
    requestTimeoutMs: number;
  };
}

const DEFAULT_PROVIDERS: ResearchProviderSettings[] = [
  {
    id: "tavily",
    enabled: true,
    priority: 1,
    timeoutMs: 8_000,
    apiKeyEnvVar: "TAVILY_API_KEY",
    baseUrl: "https://api.tavily.com",
  },
  {
    id: "serpapi",
    enabled: true,
    priority: 2,
    timeoutMs: 8_000,
    apiKeyEnvVar: "SERPAPI_API_KEY",
    baseUrl: "https://serpapi.com",
  },
  {
    id: "apify",
    enabled: true,
    priority: 3,
    timeoutMs: 12_000,
    apiKeyEnvVar: "APIFY_API_TOKEN",
    baseUrl: "https://api.apify.com",
  },
];

export const DEFAULT_CONFIG: GrowthCoachConfig = {
  logLevel: "info",
  store: {
    redisUrl: null,
    dataDir: path.resolve(process.cwd(), "data"),
    connectTimeoutMs: 2_000,
  },
  research: {
    providers: DEFAULT_PROVIDERS,
    overallTimeoutMs: 15_000,
    minProviders: 2,
    maxSummaryTokens: 400,
    surfaceDegradedToUser: true,
    embeddingModel: null,
  },
  strategy: {
    specialists: [...SPECIALIST_IDS],
    specialistTimeoutMs: 20_000,
    useInference: false,
  },
  planner: {
    minSpacingMinutes: 30,
    maxLikesPerHour: 60,
    maxFollowsPerHour: 30,
  },
  safety: {
    extraDeniedCategories: [],
  },
  dispatcher: {
    baseUrl: "http://localhost:8080",
    apiTokenEnvVar: "AUTOMATION_API_TOKEN",
    requestTimeoutMs: 10_000,
    minDelayMs: 2_000,
    jitterMs: 3_000,
    maxConcurrentPerUser: 2,
    maxAttempts: 3,
    backoffBaseMs: 1_000,
    backoffMaxMs: 30_000,
    pollIntervalMs: 5_000,
    pollTimeoutMs: 10 * 60_000,
  },
  locking: {
    distributed: false,
    lockTtlMs: 60_000,
    waitTimeoutMs: 30_000,
  },
  inference: {
    providersPath: null,
    requestTimeoutMs: 30_000,
  },
};

const CONFIG_FILENAME = "growth-coach.json";

export function loadConfig(configPath?: string): GrowthCoachConfig {
  const candidates = [
    configPath,
    process.env.GROWTH_COACH_CONFIG,
    path.resolve(process.cwd(), CONFIG_FILENAME),
  ].filter((candidate): candidate is string => typeof candidate === "string" && candidate.length > 0);

  let raw: Record<string, unknown> = {};
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
    if (!isRecord(parsed)) {
      throw new Error(`Config file ${candidate} must contain a JSON object`);
    }
    raw = parsed;
    break;
  }

  return applyEnvironment(normalizeConfig(raw), process.env);
}

export function normalizeConfig(raw: Record<string, unknown>): GrowthCoachConfig {
  const d = DEFAULT_CONFIG;
  const store = recordOr(raw.store);
  const research = recordOr(raw.research);
  const strategy = recordOr(raw.strategy);
  const planner = recordOr(raw.planner);
  const safety = recordOr(raw.safety);
  const dispatcher = recordOr(raw.dispatcher);
  const locking = recordOr(raw.locking);
  const inference = recordOr(raw.inference);

  const logLevel = typeof raw.logLevel === "string" && isLogLevel(raw.logLevel)
    ? raw.logLevel
    : d.logLevel;

  const config: GrowthCoachConfig = {
    logLevel,
    store: {
      redisUrl: nullableStringOr(store.redisUrl, d.store.redisUrl),
      dataDir: stringOr(store.dataDir, d.store.dataDir),
      connectTimeoutMs: positiveOr(store.connectTimeoutMs, d.store.connectTimeoutMs),
    },
    research: {
      providers: normalizeProviders(research.providers),
      overallTimeoutMs: positiveOr(research.overallTimeoutMs, d.research.overallTimeoutMs),
      minProviders: positiveOr(research.minProviders, d.research.minProviders),
      maxSummaryTokens: positiveOr(research.maxSummaryTokens, d.research.maxSummaryTokens),
      surfaceDegradedToUser: booleanOr(research.surfaceDegradedToUser, d.research.surfaceDegradedToUser),
      embeddingModel: nullableStringOr(research.embeddingModel, d.research.embeddingModel),
    },
    strategy: {
      specialists: normalizeSpecialists(strategy.specialists),
      specialistTimeoutMs: positiveOr(strategy.specialistTimeoutMs, d.strategy.specialistTimeoutMs),
      useInference: booleanOr(strategy.useInference, d.strategy.useInference),
    },
    planner: {
      minSpacingMinutes: positiveOr(planner.minSpacingMinutes, d.planner.minSpacingMinutes),
      maxLikesPerHour: positiveOr(planner.maxLikesPerHour, d.planner.maxLikesPerHour),
      maxFollowsPerHour: positiveOr(planner.maxFollowsPerHour, d.planner.maxFollowsPerHour),
    },
    safety: {
      extraDeniedCategories: Array.isArray(safety.extraDeniedCategories)
        ? safety.extraDeniedCategories.filter((value): value is string => typeof value === "string")
        : d.safety.extraDeniedCategories,
    },
    dispatcher: {
      baseUrl: stringOr(dispatcher.baseUrl, d.dispatcher.baseUrl),
      apiTokenEnvVar: stringOr(dispatcher.apiTokenEnvVar, d.dispatcher.apiTokenEnvVar),
      requestTimeoutMs: positiveOr(dispatcher.requestTimeoutMs, d.dispatcher.requestTimeoutMs),
      minDelayMs: nonNegativeOr(dispatcher.minDelayMs, d.dispatcher.minDelayMs),
      jitterMs: nonNegativeOr(dispatcher.jitterMs, d.dispatcher.jitterMs),
      maxConcurrentPerUser: positiveOr(dispatcher.maxConcurrentPerUser, d.dispatcher.maxConcurrentPerUser),
      maxAttempts: positiveOr(dispatcher.maxAttempts, d.dispatcher.maxAttempts),
      backoffBaseMs: nonNegativeOr(dispatcher.backoffBaseMs, d.dispatcher.backoffBaseMs),
      backoffMaxMs: nonNegativeOr(dispatcher.backoffMaxMs, d.dispatcher.backoffMaxMs),
      pollIntervalMs: nonNegativeOr(dispatcher.pollIntervalMs, d.dispatcher.pollIntervalMs),
      pollTimeoutMs: positiveOr(dispatcher.pollTimeoutMs, d.dispatcher.pollTimeoutMs),
    },
    locking: {
      distributed: booleanOr(locking.distributed, d.locking.distributed),
      lockTtlMs: positiveOr(locking.lockTtlMs, d.locking.lockTtlMs),
      waitTimeoutMs: positiveOr(locking.waitTimeoutMs, d.locking.waitTimeoutMs),
    },
    inference: {
      providersPath: nullableStringOr(inference.providersPath, d.inference.providersPath),
      requestTimeoutMs: positiveOr(inference.requestTimeoutMs, d.inference.requestTimeoutMs),
    },
  };

  const slowestProvider = Math.max(0, ...config.research.providers.map((p) => p.timeoutMs));
  if (config.research.overallTimeoutMs <= slowestProvider) {
    throw new Error(
      `research.overallTimeoutMs (${config.research.overallTimeoutMs}) must exceed the slowest provider timeout (${slowestProvider})`,
    );
  }

  // The session lock is never renewed, so it has to outlive the slowest turn.
  const longestTurnMs = config.research.overallTimeoutMs + config.strategy.specialistTimeoutMs;
  if (config.locking.lockTtlMs <= longestTurnMs) {
    throw new Error(
      `locking.lockTtlMs (${config.locking.lockTtlMs}) must exceed the longest turn (${longestTurnMs}ms of research and strategy timeouts)`,
    );
  }

  return config;
}

export function applyEnvironment(config: GrowthCoachConfig, env: NodeJS.ProcessEnv): GrowthCoachConfig {
  const logLevel = env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : config.logLevel;
  return {
    ...config,
    logLevel,
    store: {
      ...config.store,
      redisUrl: env.REDIS_URL || config.store.redisUrl,
      dataDir: env.GROWTH_COACH_DATA_DIR ? path.resolve(env.GROWTH_COACH_DATA_DIR) : config.store.dataDir,
    },
    dispatcher: {
      ...config.dispatcher,
      baseUrl: env.AUTOMATION_BASE_URL || config.dispatcher.baseUrl,
    },
  };
}

function normalizeProviders(input: unknown): ResearchProviderSettings[] {
  if (!Array.isArray(input)) {
    return DEFAULT_PROVIDERS.map((provider) => ({ ...provider }));
  }

  const normalized: ResearchProviderSettings[] = [];
  for (const rawProvider of input) {
    if (!isRecord(rawProvider)) {
      continue;
    }
    const fallback = DEFAULT_PROVIDERS.find((provider) => provider.id === rawProvider.id);
    if (!fallback) {
      continue;
    }
    normalized.push({
      id: fallback.id,
      enabled: booleanOr(rawProvider.enabled, fallback.enabled),
      priority: numberOr(rawProvider.priority, fallback.priority),
      timeoutMs: positiveOr(rawProvider.timeoutMs, fallback.timeoutMs),
      apiKeyEnvVar: stringOr(rawProvider.apiKeyEnvVar, fallback.apiKeyEnvVar),
      baseUrl: stringOr(rawProvider.baseUrl, fallback.baseUrl),
    });
  }

  return normalized.sort((a, b) => a.priority - b.priority);
}

function normalizeSpecialists(input: unknown): SpecialistId[] {
  if (!Array.isArray(input)) {
    return [...SPECIALIST_IDS];
  }
  const known = input.filter((value): value is SpecialistId =>
    typeof value === "string" && (SPECIALIST_IDS as readonly string[]).includes(value));
  return Array.from(new Set(known));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recordOr(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function nullableStringOr(value: unknown, fallback: string | null): string | null {
  if (value === null) {
    return null;
  }
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function positiveOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}
