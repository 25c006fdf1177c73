/**
 * Insight ranking and summary synthesis.
 */

import { getEncoding, type Tiktoken } from "js-tiktoken";
import type { ResearchInsight } from "../types.js";

let encoder: Tiktoken | null | undefined;

function getEncoder(): Tiktoken | null {
  if (encoder === undefined) {
    try {
      encoder = getEncoding("cl100k_base");
    } catch {
      encoder = null;
    }
  }
  return encoder;
}

/**
 * Highest confidence first; equal confidence falls back to the provider's
 * priority rank, then to arrival order.
 */
export function rankInsights(
  insights: ResearchInsight[],
  rankOf: (providerName: string) => number,
): ResearchInsight[] {
  return insights
    .map((insight, index) => ({ insight, index, rank: rankOf(insight.providerName) }))
    .sort((a, b) =>
      b.insight.confidence - a.insight.confidence || a.rank - b.rank || a.index - b.index)
    .map((entry) => entry.insight);
}

export function formatInsightLine(insight: ResearchInsight): string {
  const label = insight.simulated ? "simulated" : insight.providerName;
  return `- [${label}] ${insight.summaryText.replace(/\s+/g, " ").trim()}`;
}

/**
 * One line per insight in ranked order, cut at `maxTokens`. A non-empty
 * insight list always yields a non-empty summary.
 */
export function synthesizeSummary(insights: ResearchInsight[], maxTokens: number): string {
  if (insights.length === 0) {
    return "";
  }

  const text = insights.map(formatInsightLine).join("\n");
  return truncateToTokens(text, Math.max(1, maxTokens));
}

export function truncateToTokens(text: string, maxTokens: number): string {
  const enc = getEncoder();
  if (!enc) {
    // Rough fallback of 3.5 characters per token.
    const maxChars = Math.floor(maxTokens * 3.5);
    return text.length <= maxChars ? text : text.slice(0, maxChars);
  }

  const tokens = enc.encode(text);
  if (tokens.length <= maxTokens) {
    return text;
  }
  return enc.decode(tokens.slice(0, maxTokens));
}
