/**
 * Query Classifier
 *
 * Maps a query to an intent. The intent decides how long a research result
 * stays cached and which model tier answers it.
 */

import { normalizeError } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import type { QueryIntent } from "../types.js";
import type { InferenceClient } from "./inference-client.js";
import type { ModelTier } from "./provider-registry.js";

const logger = createLogger("inference.query-classifier");

export const QUERY_INTENTS: readonly QueryIntent[] = [
  "simple_chat",
  "growth_research",
  "competitor_analysis",
  "strategy",
  "general",
];

const INTENT_TTL_SECONDS: Record<QueryIntent, number> = {
  growth_research: 600,
  competitor_analysis: 1800,
  strategy: 3600,
  simple_chat: 86400,
  general: 3600,
};

const INTENT_TIERS: Record<QueryIntent, ModelTier> = {
  simple_chat: "cheap",
  general: "fast",
  growth_research: "fast",
  competitor_analysis: "reasoning",
  strategy: "reasoning",
};

// Checked in order; the first intent with a matching pattern wins.
const KEYWORD_RULES: { intent: QueryIntent; pattern: RegExp }[] = [
  {
    intent: "competitor_analysis",
    pattern: /\b(competitors?|competition|rivals?|compare|comparison|benchmark|vs\.?)\b/,
  },
  {
    intent: "growth_research",
    pattern: /\b(grow|growth|followers?|reach|engagement|hashtags?|algorithm|viral|trending|trends?)\b/,
  },
  {
    intent: "strategy",
    pattern: /\b(strateg(y|ies)|plan|roadmap|funnel|calendar|playbook)\b/,
  },
  {
    intent: "simple_chat",
    pattern: /^(hi|hello|hey|thanks|thank you|ok|okay|yes|no|cool|great)\b/,
  },
];

export interface QueryClassifier {
  classify(query: string, signal?: AbortSignal): Promise<QueryIntent>;
}

export function ttlForIntent(intent: QueryIntent): number {
  return INTENT_TTL_SECONDS[intent];
}

export function tierForIntent(intent: QueryIntent): ModelTier {
  return INTENT_TIERS[intent];
}

export function isQueryIntent(value: string): value is QueryIntent {
  return (QUERY_INTENTS as readonly string[]).includes(value);
}

export class KeywordQueryClassifier implements QueryClassifier {
  async classify(query: string): Promise<QueryIntent> {
    return classifyByKeywords(query);
  }
}

export function classifyByKeywords(query: string): QueryIntent {
  const normalized = query.trim().toLowerCase();
  if (normalized.length === 0) {
    return "simple_chat";
  }

  for (const rule of KEYWORD_RULES) {
    if (rule.pattern.test(normalized)) {
      return rule.intent;
    }
  }

  return "general";
}

/**
 * Asks the cheap tier for a single label. Any failure, or a label outside
 * the closed set, falls back to the keyword rules.
 */
export class LlmQueryClassifier implements QueryClassifier {
  constructor(
    private readonly client: InferenceClient,
    private readonly options: { timeoutMs?: number } = {},
  ) {}

  async classify(query: string, signal?: AbortSignal): Promise<QueryIntent> {
    try {
      const result = await this.client.chat({
        tier: "cheap",
        temperature: 0,
        maxTokens: 10,
        timeoutMs: this.options.timeoutMs,
        signal,
        messages: [
          {
            role: "system",
            content:
              "Classify the user's query for a social media growth assistant. " +
              `Answer with exactly one label from: ${QUERY_INTENTS.join(", ")}.`,
          },
          { role: "user", content: query },
        ],
      });

      const label = result.content.trim().toLowerCase().replace(/[^a-z_]/g, "");
      if (isQueryIntent(label)) {
        return label;
      }

      logger.debug("Classifier returned an unknown label, using keywords", { label });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn("LLM classification failed, using keywords", {
        error: normalizeError(error).message,
      });
    }

    return classifyByKeywords(query);
  }
}
