/**
 * Proposal merge.
 *
 * Recommendations from all specialists are folded into one list keyed by
 * `kind:subject`. Proposals are walked in specialist priority order, so
 * the first entry for a key always belongs to the highest-ranked
 * specialist that proposed it.
 */

import {
  SPECIALIST_IDS,
  type ConflictResolution,
  type Recommendation,
  type RecommendationKind,
  type SpecialistId,
  type StrategyProposal,
  type UnifiedRecommendation,
} from "../types.js";

/** Highest priority first. */
export const SPECIALIST_PRIORITY: readonly SpecialistId[] = SPECIALIST_IDS;

/** Kinds where several values for one subject can coexist. */
const ADDITIVE_KINDS: ReadonlySet<RecommendationKind> = new Set(["content_theme"]);

const SUBJECT_SYNONYMS: Record<string, string> = {
  reel: "reels",
  short: "reels",
  shorts: "reels",
  short_videos: "reels",
  video: "reels",
  videos: "reels",
  post: "feed",
  posts: "feed",
  feed_posts: "feed",
  grid: "feed",
  story: "stories",
  carousel: "carousels",
  hashtag: "discovery",
  hashtags: "discovery",
  niche_account: "niche_accounts",
  follower: "new_followers",
  followers: "new_followers",
};

const VALUE_SYNONYMS: Record<string, string> = {
  every_day: "daily",
  once_a_day: "daily",
  "1x_daily": "daily",
  "7x_weekly": "daily",
  once_a_week: "weekly",
  "1x_weekly": "weekly",
};

export function foldToken(raw: string): string {
  return raw
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function foldSubject(subject: string): string {
  const token = foldToken(subject);
  return SUBJECT_SYNONYMS[token] ?? token;
}

export function foldValue(value: string): string {
  const token = foldToken(value);
  return VALUE_SYNONYMS[token] ?? token;
}

export function isExclusiveKind(kind: RecommendationKind): boolean {
  return !ADDITIVE_KINDS.has(kind);
}

export function semanticKey(recommendation: Recommendation): string {
  const base = `${recommendation.kind}:${foldSubject(recommendation.subject)}`;
  return isExclusiveKind(recommendation.kind) ? base : `${base}:${foldValue(recommendation.value)}`;
}

export interface MergeResult {
  unified: UnifiedRecommendation[];
  resolutions: ConflictResolution[];
  contributingSpecialists: SpecialistId[];
}

export function mergeProposals(proposals: StrategyProposal[]): MergeResult {
  const ordered = [...proposals].sort(
    (a, b) => SPECIALIST_PRIORITY.indexOf(a.specialistName) - SPECIALIST_PRIORITY.indexOf(b.specialistName),
  );

  const byKey = new Map<string, UnifiedRecommendation>();
  const resolutions: ConflictResolution[] = [];

  for (const proposal of ordered) {
    const specialist = proposal.specialistName;

    for (const recommendation of proposal.recommendations) {
      const key = semanticKey(recommendation);
      const existing = byKey.get(key);

      if (!existing) {
        byKey.set(key, {
          ...recommendation,
          parameters: { ...recommendation.parameters },
          key,
          sources: [specialist],
          auxiliaryRationale: [],
        });
        continue;
      }

      if (foldValue(existing.value) === foldValue(recommendation.value)) {
        if (!existing.sources.includes(specialist)) {
          existing.sources.push(specialist);
          existing.auxiliaryRationale.push(`${specialist}: ${recommendation.rationale}`);
        }
        continue;
      }

      const winner = existing.sources[0];
      existing.auxiliaryRationale.push(`${specialist} (${recommendation.value}): ${recommendation.rationale}`);
      resolutions.push({
        key,
        winner,
        winningValue: existing.value,
        loser: specialist,
        losingValue: recommendation.value,
        reason: winner === specialist
          ? `${specialist} proposed ${existing.value} first`
          : `${winner} outranks ${specialist} on ${recommendation.kind}`,
      });
    }
  }

  return {
    unified: [...byKey.values()],
    resolutions,
    contributingSpecialists: ordered
      .map((proposal) => proposal.specialistName)
      .filter((id, index, all) => all.indexOf(id) === index),
  };
}
