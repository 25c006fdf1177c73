import fs from "node:fs";
import OpenAI from "openai";
import { createLogger } from "../observability/logger.js";

const logger = createLogger("inference.provider-registry");

export type ModelTier = "reasoning" | "fast" | "cheap";

export interface ProviderConfig {
  id: string;
  name: string;
  baseUrl: string;
  apiKeyEnvVar: string;
  models: ModelConfig[];
  priority: number;
  enabled: boolean;
}

export interface ModelConfig {
  id: string;
  tier: ModelTier;
  maxOutputTokens: number;
  costPerInputToken: number;
  costPerOutputToken: number;
}

export interface ResolvedModel {
  provider: ProviderConfig;
  model: ModelConfig;
  client: OpenAI;
}

interface TierDefault {
  preferredProvider: string;
  fallbackOrder: string[];
}

interface ProviderDisablement {
  reason: string;
  disabledUntil: number;
}

interface ProviderConfigFile {
  providers?: unknown;
  tierDefaults?: Partial<Record<ModelTier, Partial<TierDefault>>>;
}

const MODEL_TIERS: readonly ModelTier[] = ["reasoning", "fast", "cheap"];

const DEFAULT_TIER_DEFAULTS: Record<ModelTier, TierDefault> = {
  reasoning: {
    preferredProvider: "openrouter",
    fallbackOrder: ["openai"],
  },
  fast: {
    preferredProvider: "openrouter",
    fallbackOrder: ["openai", "local"],
  },
  cheap: {
    preferredProvider: "openrouter",
    fallbackOrder: ["local", "openai"],
  },
};

export const DEFAULT_PROVIDERS: ProviderConfig[] = [
  {
    id: "openrouter",
    name: "OpenRouter",
    baseUrl: "https://openrouter.ai/api/v1",
    apiKeyEnvVar: "OPENROUTER_API_KEY",
    models: [
      {
        id: "moonshotai/kimi-k2-0905",
        tier: "reasoning",
        maxOutputTokens: 4000,
        costPerInputToken: 0.6,
        costPerOutputToken: 2.5,
      },
      {
        id: "microsoft/phi-4",
        tier: "fast",
        maxOutputTokens: 4000,
        costPerInputToken: 0.07,
        costPerOutputToken: 0.14,
      },
      {
        id: "deepseek/deepseek-chat-v3.1:free",
        tier: "cheap",
        maxOutputTokens: 4000,
        costPerInputToken: 0,
        costPerOutputToken: 0,
      },
    ],
    priority: 1,
    enabled: true,
  },
  {
    id: "openai",
    name: "OpenAI",
    baseUrl: "https://api.openai.com/v1",
    apiKeyEnvVar: "OPENAI_API_KEY",
    models: [
      {
        id: "gpt-4.1",
        tier: "reasoning",
        maxOutputTokens: 32768,
        costPerInputToken: 2.0,
        costPerOutputToken: 8.0,
      },
      {
        id: "gpt-4.1-mini",
        tier: "fast",
        maxOutputTokens: 16384,
        costPerInputToken: 0.4,
        costPerOutputToken: 1.6,
      },
      {
        id: "gpt-4.1-nano",
        tier: "cheap",
        maxOutputTokens: 16384,
        costPerInputToken: 0.1,
        costPerOutputToken: 0.4,
      },
    ],
    priority: 2,
    enabled: true,
  },
  {
    id: "local",
    name: "Local (Ollama/vLLM)",
    baseUrl: "http://localhost:11434/v1",
    apiKeyEnvVar: "LOCAL_API_KEY",
    models: [
      {
        id: "llama3.1:8b",
        tier: "fast",
        maxOutputTokens: 4096,
        costPerInputToken: 0,
        costPerOutputToken: 0,
      },
      {
        id: "llama3.1:8b",
        tier: "cheap",
        maxOutputTokens: 4096,
        costPerInputToken: 0,
        costPerOutputToken: 0,
      },
    ],
    priority: 10,
    enabled: false,
  },
];

export class ProviderRegistry {
  private readonly providers: ProviderConfig[];
  private readonly tierDefaults: Record<ModelTier, TierDefault>;
  private readonly disablements = new Map<string, ProviderDisablement>();
  private readonly clients = new Map<string, OpenAI>();

  constructor(
    providers: ProviderConfig[],
    tierDefaults: Record<ModelTier, TierDefault> = DEFAULT_TIER_DEFAULTS,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.providers = providers
      .map((provider) => deepCloneProvider(provider))
      .sort((a, b) => a.priority - b.priority);
    this.tierDefaults = {
      reasoning: normalizeTierDefault(tierDefaults.reasoning, DEFAULT_TIER_DEFAULTS.reasoning),
      fast: normalizeTierDefault(tierDefaults.fast, DEFAULT_TIER_DEFAULTS.fast),
      cheap: normalizeTierDefault(tierDefaults.cheap, DEFAULT_TIER_DEFAULTS.cheap),
    };
  }

  static fromConfig(configPath: string | null, env: NodeJS.ProcessEnv = process.env): ProviderRegistry {
    let providers = DEFAULT_PROVIDERS.map((provider) => deepCloneProvider(provider));
    let tierDefaults = DEFAULT_TIER_DEFAULTS;

    if (!configPath || !fs.existsSync(configPath)) {
      return new ProviderRegistry(providers, tierDefaults, env);
    }

    let raw: ProviderConfigFile;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, "utf-8")) as ProviderConfigFile;
    } catch (error) {
      logger.warn("Ignoring unreadable provider config", {
        path: configPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return new ProviderRegistry(providers, tierDefaults, env);
    }
    const configuredProviders = normalizeProviders(raw.providers);
    if (configuredProviders.length > 0) {
      providers = configuredProviders;
    }

    if (raw.tierDefaults && typeof raw.tierDefaults === "object") {
      tierDefaults = {
        reasoning: normalizeTierDefault(raw.tierDefaults.reasoning, DEFAULT_TIER_DEFAULTS.reasoning),
        fast: normalizeTierDefault(raw.tierDefaults.fast, DEFAULT_TIER_DEFAULTS.fast),
        cheap: normalizeTierDefault(raw.tierDefaults.cheap, DEFAULT_TIER_DEFAULTS.cheap),
      };
    }

    return new ProviderRegistry(providers, tierDefaults, env);
  }

  resolveCandidates(tier: ModelTier): ResolvedModel[] {
    const results: ResolvedModel[] = [];

    for (const provider of this.getProviderOrderForTier(tier)) {
      if (!this.isProviderActive(provider)) {
        continue;
      }

      const model = provider.models.find((candidate) => candidate.tier === tier);
      if (!model) {
        continue;
      }

      results.push(this.buildResolvedModel(provider, model));
    }

    return results;
  }

  getProviders(): ProviderConfig[] {
    return this.providers.map((provider) => ({
      ...deepCloneProvider(provider),
      enabled: this.isProviderActive(provider),
    }));
  }

  disableProvider(id: string, reason: string, durationMs: number): void {
    const provider = this.providers.find((candidate) => candidate.id === id);
    if (!provider) {
      return;
    }

    this.disablements.set(id, {
      reason,
      disabledUntil: Date.now() + Math.max(0, durationMs),
    });
  }

  enableProvider(id: string): void {
    this.disablements.delete(id);
  }

  /** True when at least one enabled provider holds a usable credential. */
  hasCredentials(): boolean {
    return this.providers.some((provider) =>
      provider.enabled && (provider.id === "local" || Boolean(this.env[provider.apiKeyEnvVar])));
  }

  private getProviderOrderForTier(tier: ModelTier): ProviderConfig[] {
    const preferred = this.tierDefaults[tier];
    const orderedIds = [
      preferred.preferredProvider,
      ...preferred.fallbackOrder,
      ...this.providers.map((provider) => provider.id),
    ];

    const seen = new Set<string>();
    const orderedProviders: ProviderConfig[] = [];

    for (const id of orderedIds) {
      if (seen.has(id)) {
        continue;
      }
      seen.add(id);

      const provider = this.providers.find((candidate) => candidate.id === id);
      if (provider) {
        orderedProviders.push(provider);
      }
    }

    return orderedProviders;
  }

  private buildResolvedModel(provider: ProviderConfig, model: ModelConfig): ResolvedModel {
    let client = this.clients.get(provider.id);
    if (!client) {
      client = new OpenAI({
        apiKey: this.resolveApiKey(provider),
        baseURL: provider.baseUrl,
        maxRetries: 0,
      });
      this.clients.set(provider.id, client);
    }

    return {
      provider: deepCloneProvider(provider),
      model: { ...model },
      client,
    };
  }

  private resolveApiKey(provider: ProviderConfig): string {
    const configured = this.env[provider.apiKeyEnvVar];
    if (typeof configured === "string" && configured.length > 0) {
      return configured;
    }

    if (provider.id === "local") {
      return "local";
    }

    return `missing-${provider.apiKeyEnvVar.toLowerCase()}`;
  }

  private isProviderActive(provider: ProviderConfig): boolean {
    if (!provider.enabled) {
      return false;
    }

    const disabled = this.disablements.get(provider.id);
    if (!disabled) {
      return true;
    }

    if (disabled.disabledUntil <= Date.now()) {
      this.disablements.delete(provider.id);
      return true;
    }

    return false;
  }
}

function normalizeProviders(input: unknown): ProviderConfig[] {
  if (!Array.isArray(input)) {
    return [];
  }

  const defaultsById = new Map(DEFAULT_PROVIDERS.map((provider) => [provider.id, provider]));
  const normalized: ProviderConfig[] = [];

  for (const rawProvider of input) {
    if (!rawProvider || typeof rawProvider !== "object") {
      continue;
    }

    const candidate = rawProvider as Record<string, unknown>;
    const id = typeof candidate.id === "string" ? candidate.id : null;
    if (!id) {
      continue;
    }

    const fallback = defaultsById.get(id);
    const models = normalizeModels(candidate.models, fallback?.models ?? []);
    if (models.length === 0) {
      continue;
    }

    normalized.push({
      id,
      name: stringOr(candidate.name, fallback?.name ?? id),
      baseUrl: stringOr(candidate.baseUrl, fallback?.baseUrl ?? "https://api.openai.com/v1"),
      apiKeyEnvVar: stringOr(candidate.apiKeyEnvVar, fallback?.apiKeyEnvVar ?? "OPENAI_API_KEY"),
      models,
      priority: numberOr(candidate.priority, fallback?.priority ?? 100),
      enabled: booleanOr(candidate.enabled, fallback?.enabled ?? true),
    });
  }

  return normalized.sort((a, b) => a.priority - b.priority);
}

function normalizeModels(input: unknown, fallbackModels: ModelConfig[]): ModelConfig[] {
  if (!Array.isArray(input)) {
    return fallbackModels.map((model) => ({ ...model }));
  }

  const models: ModelConfig[] = [];

  for (const rawModel of input) {
    if (!rawModel || typeof rawModel !== "object") {
      continue;
    }

    const candidate = rawModel as Record<string, unknown>;
    const id = typeof candidate.id === "string" ? candidate.id : null;
    if (!id) {
      continue;
    }

    const fallbackById = fallbackModels.find((model) => model.id === id);
    const tier = normalizeTier(candidate.tier, fallbackById?.tier);
    const fallback =
      fallbackModels.find((model) => model.id === id && model.tier === tier) ?? fallbackById;

    models.push({
      id,
      tier,
      maxOutputTokens: numberOr(candidate.maxOutputTokens, fallback?.maxOutputTokens ?? 4096),
      costPerInputToken: numberOr(candidate.costPerInputToken, fallback?.costPerInputToken ?? 0),
      costPerOutputToken: numberOr(candidate.costPerOutputToken, fallback?.costPerOutputToken ?? 0),
    });
  }

  return models;
}

function normalizeTier(input: unknown, fallback: ModelTier | undefined): ModelTier {
  if (typeof input === "string" && (MODEL_TIERS as readonly string[]).includes(input)) {
    return input as ModelTier;
  }

  return fallback ?? "fast";
}

function normalizeTierDefault(input: Partial<TierDefault> | undefined, fallback: TierDefault): TierDefault {
  const preferredProvider =
    typeof input?.preferredProvider === "string" && input.preferredProvider.length > 0
      ? input.preferredProvider
      : fallback.preferredProvider;

  const fallbackOrder = Array.isArray(input?.fallbackOrder)
    ? input.fallbackOrder.filter((id): id is string => typeof id === "string")
    : fallback.fallbackOrder;

  return {
    preferredProvider,
    fallbackOrder: fallbackOrder.filter((id) => id !== preferredProvider),
  };
}

function deepCloneProvider(provider: ProviderConfig): ProviderConfig {
  return {
    ...provider,
    models: provider.models.map((model) => ({ ...model })),
  };
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}
