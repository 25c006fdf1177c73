import { createHash } from "node:crypto";
import type { GoalContext } from "../types.js";

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, " ");
}

/** sha256 of the normalized query; equal fingerprints share one cache entry. */
export function fingerprintQuery(query: string): string {
  return createHash("sha256").update(normalizeQuery(query)).digest("hex");
}

export function researchCacheKey(fingerprint: string): string {
  return `research:${fingerprint}`;
}

/**
 * Research query for a completed goal context. Constraints and audience
 * are left out so that users chasing the same goal share a cache entry.
 */
export function buildResearchQuery(context: GoalContext): string {
  const parts = [
    context.niche ?? "general",
    context.platform,
    "growth",
  ];

  if (context.currentFollowers !== undefined && context.targetFollowers !== undefined) {
    parts.push(`from ${context.currentFollowers} to ${context.targetFollowers} followers`);
  }

  if (context.timeframeDays !== undefined) {
    parts.push(`in ${context.timeframeDays} days`);
  }

  return parts.join(" ");
}
