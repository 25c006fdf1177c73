/**
 * Strategy Specialists
 *
 * Each specialist turns a goal and its research into a StrategyProposal.
 * The heuristic variant runs the specialist's playbook; the inference
 * variant asks a model for JSON recommendations, validates them and falls
 * back to the playbook when the call or the validation fails.
 */

import { isAbortError, normalizeError } from "../errors.js";
import type { InferenceClient } from "../inference/inference-client.js";
import { tierForIntent } from "../inference/query-classifier.js";
import type { ModelTier } from "../inference/provider-registry.js";
import { createLogger } from "../observability/logger.js";
import {
  RECOMMENDATION_KINDS,
  type GoalContext,
  type Recommendation,
  type RecommendationKind,
  type ResearchResult,
  type SpecialistId,
  type StrategyProposal,
} from "../types.js";
import { runPlaybook } from "./playbooks.js";

const logger = createLogger("strategy.specialists");

export interface Specialist {
  readonly id: SpecialistId;
  propose(
    context: GoalContext,
    research: ResearchResult | null,
    signal: AbortSignal,
  ): Promise<StrategyProposal>;
}

export class HeuristicSpecialist implements Specialist {
  constructor(readonly id: SpecialistId) {}

  async propose(context: GoalContext, research: ResearchResult | null): Promise<StrategyProposal> {
    return runPlaybook(this.id, context, research);
  }
}

const PERSONAS: Record<SpecialistId, string> = {
  growth: "You are a growth hacker for Instagram creators. You push for reach: posting cadence, hashtag tiers, collaborations and targeted follows.",
  engagement: "You are an engagement expert. You grow accounts through likes, follows, replies and timing rather than raw posting volume.",
  content: "You are a content strategist. You decide formats, themes and cadence per format so the algorithm shows posts to non-followers.",
  funnel: "You are a funnel architect. You turn profile visits into followers and followers into leads: bio, calls to action, outreach and tracking.",
};

const MAX_RECOMMENDATIONS = 8;

export interface InferenceSpecialistOptions {
  tier?: ModelTier;
  maxTokens?: number;
  fallback?: Specialist;
}

export class InferenceSpecialist implements Specialist {
  private readonly fallback: Specialist;
  private readonly tier: ModelTier;
  private readonly maxTokens: number;

  constructor(
    readonly id: SpecialistId,
    private readonly inference: InferenceClient,
    options: InferenceSpecialistOptions = {},
  ) {
    this.fallback = options.fallback ?? new HeuristicSpecialist(id);
    this.tier = options.tier ?? tierForIntent("strategy");
    this.maxTokens = options.maxTokens ?? 1_500;
  }

  async propose(
    context: GoalContext,
    research: ResearchResult | null,
    signal: AbortSignal,
  ): Promise<StrategyProposal> {
    try {
      const result = await this.inference.chat({
        tier: this.tier,
        responseFormat: { type: "json_object" },
        temperature: 0.4,
        maxTokens: this.maxTokens,
        signal,
        messages: [
          { role: "system", content: buildSpecialistPrompt(this.id) },
          { role: "user", content: buildSpecialistUserPrompt(context, research) },
        ],
      });
      return validateProposalOutput(this.id, parseProposalResponse(result.content));
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        throw error;
      }
      logger.warn("Specialist inference failed, using playbook", {
        specialist: this.id,
        error: normalizeError(error).message,
      });
      return this.fallback.propose(context, research, signal);
    }
  }
}

export function createSpecialists(
  ids: SpecialistId[],
  inference: InferenceClient | null,
): Specialist[] {
  return ids.map((id) => (inference ? new InferenceSpecialist(id, inference) : new HeuristicSpecialist(id)));
}

export function buildSpecialistPrompt(id: SpecialistId): string {
  return `${PERSONAS[id]}

Propose at most ${MAX_RECOMMENDATIONS} concrete tactics for the goal you are given.

Each recommendation has:
- kind: one of ${RECOMMENDATION_KINDS.join(", ")}
- subject: what it applies to, e.g. "reels", "feed", "niche_accounts"
- value: the setting, e.g. "daily", "4x_weekly", "targeted"
- description: one sentence the creator can act on
- rationale: why it moves the goal
- parameters: object of numbers, strings or string arrays (use "dailyQuota" for daily action counts)

Respond with a JSON object:
{"rationale": "...", "recommendations": [{"kind": "...", "subject": "...", "value": "...", "description": "...", "rationale": "...", "parameters": {}}]}`;
}

function buildSpecialistUserPrompt(context: GoalContext, research: ResearchResult | null): string {
  const payload = {
    goal: context,
    research: research
      ? { summary: research.synthesizedSummary, degraded: research.degraded }
      : null,
  };
  return [
    "Return only a valid JSON object.",
    "Input:",
    JSON.stringify(payload, null, 2),
  ].join("\n");
}

export function parseProposalResponse(content: string): unknown {
  if (content.trim().length === 0) {
    throw new Error("Specialist returned an empty response");
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Specialist returned invalid JSON: ${message}`);
  }
}

export function validateProposalOutput(id: SpecialistId, output: unknown): StrategyProposal {
  const record = asRecord(output, "proposal");
  const rationale = requiredString(record.rationale, "rationale");
  const entries = requiredArray(record.recommendations, "recommendations");
  if (entries.length === 0) {
    throw new Error("recommendations cannot be empty");
  }

  return {
    specialistName: id,
    rationale,
    recommendations: entries
      .slice(0, MAX_RECOMMENDATIONS)
      .map((entry, index) => validateRecommendation(entry, `recommendations[${index}]`)),
  };
}

function validateRecommendation(value: unknown, path: string): Recommendation {
  const record = asRecord(value, path);
  return {
    kind: requiredKind(record.kind, `${path}.kind`),
    subject: requiredString(record.subject, `${path}.subject`),
    value: requiredString(record.value, `${path}.value`),
    description: requiredString(record.description, `${path}.description`),
    rationale: requiredString(record.rationale, `${path}.rationale`),
    parameters: record.parameters === undefined
      ? {}
      : validateParameters(record.parameters, `${path}.parameters`),
  };
}

function validateParameters(value: unknown, path: string): Recommendation["parameters"] {
  const record = asRecord(value, path);
  const parameters: Recommendation["parameters"] = {};
  for (const [key, entry] of Object.entries(record)) {
    if (typeof entry === "number" && Number.isFinite(entry)) {
      parameters[key] = entry;
    } else if (typeof entry === "string") {
      parameters[key] = entry;
    } else if (Array.isArray(entry)) {
      parameters[key] = entry.map((item, index) => requiredString(item, `${path}.${key}[${index}]`));
    } else {
      throw new Error(`${path}.${key} must be a number, string or string array`);
    }
  }
  return parameters;
}

function requiredKind(value: unknown, path: string): RecommendationKind {
  const kind = requiredString(value, path);
  const match = RECOMMENDATION_KINDS.find((candidate) => candidate === kind);
  if (!match) {
    throw new Error(`${path} must be one of ${RECOMMENDATION_KINDS.join(", ")}`);
  }
  return match;
}

function asRecord(value: unknown, path: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${path} must be an object`);
  }
  return value as Record<string, unknown>;
}

function requiredArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`);
  }
  return value;
}

function requiredString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new Error(`${path} must be a string`);
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`${path} cannot be empty`);
  }
  return trimmed;
}
