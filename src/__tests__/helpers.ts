import type { UnifiedInferenceResult } from "../inference/inference-client.js";
import type { ModelTier } from "../inference/provider-registry.js";
import type { GoalContext } from "../types.js";

export function completion(content: string, tier: ModelTier = "cheap"): UnifiedInferenceResult {
  return {
    content,
    usage: { inputTokens: 10, outputTokens: 2, totalTokens: 12 },
    cost: { inputCostCredits: 0, outputCostCredits: 0, totalCostCredits: 0 },
    metadata: {
      providerId: "openrouter",
      modelId: "deepseek/deepseek-chat-v3.1:free",
      tier,
      latencyMs: 5,
      retries: 0,
      failedProviders: [],
    },
  };
}

export function fitnessContext(overrides: Partial<GoalContext> = {}): GoalContext {
  return {
    niche: "fitness",
    currentFollowers: 500,
    targetFollowers: 5000,
    timeframeDays: 60,
    constraints: [],
    platform: "instagram",
    targetAudience: [],
    ...overrides,
  };
}
