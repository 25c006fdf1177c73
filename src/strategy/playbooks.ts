/**
 * Specialist Playbooks
 *
 * Heuristic evaluators behind each specialist. They read the goal numbers
 * and the top research signal and emit a fixed set of tactics whose
 * intensity scales with how aggressive the goal is.
 */

import type {
  GoalContext,
  Recommendation,
  ResearchResult,
  SpecialistId,
  StrategyProposal,
} from "../types.js";

export interface GoalMetrics {
  niche: string;
  currentFollowers: number;
  targetFollowers: number;
  timeframeDays: number;
  followerDelta: number;
  followersPerDay: number;
  /** Target at least three times the current audience, or starting from zero. */
  aggressive: boolean;
}

const DEFAULT_TIMEFRAME_DAYS = 30;

export function goalMetrics(context: GoalContext): GoalMetrics {
  const currentFollowers = Math.max(0, context.currentFollowers ?? 0);
  const targetFollowers = Math.max(currentFollowers, context.targetFollowers ?? currentFollowers);
  const timeframeDays = context.timeframeDays && context.timeframeDays > 0
    ? context.timeframeDays
    : DEFAULT_TIMEFRAME_DAYS;
  const followerDelta = targetFollowers - currentFollowers;

  return {
    niche: context.niche?.trim() || "general",
    currentFollowers,
    targetFollowers,
    timeframeDays,
    followerDelta,
    followersPerDay: Math.ceil(followerDelta / timeframeDays),
    aggressive: currentFollowers === 0 || targetFollowers >= currentFollowers * 3,
  };
}

type Playbook = (metrics: GoalMetrics, context: GoalContext) => Recommendation[];

function audienceOf(metrics: GoalMetrics, context: GoalContext): string[] {
  return context.targetAudience.length > 0 ? [...context.targetAudience] : [`${metrics.niche} enthusiasts`];
}

const growthPlaybook: Playbook = (m, context): Recommendation[] => [
  {
    kind: "posting_frequency",
    subject: "feed",
    value: m.aggressive ? "daily" : "5x_weekly",
    description: m.aggressive ? "Publish one feed post every day" : "Publish five feed posts a week",
    rationale: `Reaching ${m.targetFollowers} needs about ${m.followersPerDay} new followers a day; more posts mean more chances to hit Explore.`,
    parameters: { postsPerWeek: m.aggressive ? 7 : 5 },
  },
  {
    kind: "hashtag_strategy",
    subject: "discovery",
    value: "mid_tier_focus",
    description: "Use 10-15 hashtags per post, weighted toward mid-sized tags",
    rationale: "Mid-tier tags (10k-500k posts) keep posts ranked long enough to be found.",
    parameters: { hashtagsPerPost: 12, tiers: ["10k-100k", "100k-500k"], seedTopics: [m.niche] },
  },
  {
    kind: "engagement_follow",
    subject: "niche_accounts",
    value: "targeted",
    description: `Follow active accounts in the ${m.niche} niche`,
    rationale: "Targeted follows of active niche accounts convert to follow-backs at a useful rate.",
    parameters: { dailyQuota: m.aggressive ? 25 : 15, audience: audienceOf(m, context) },
  },
  {
    kind: "collaboration",
    subject: "niche_creators",
    value: "monthly_collab",
    description: "Run a collab post or live with a creator of similar size",
    rationale: "Collabs borrow an audience that already cares about the niche.",
    parameters: { collabsPerMonth: m.aggressive ? 2 : 1 },
  },
  {
    kind: "analytics_review",
    subject: "growth_metrics",
    value: "weekly",
    description: "Review follower growth and reach once a week",
    rationale: `A weekly check shows early whether ${m.followersPerDay} followers a day is on track.`,
    parameters: { metrics: ["followers_count", "daily_reach"] },
  },
];

const engagementPlaybook: Playbook = (m, context): Recommendation[] => [
  {
    kind: "engagement_like",
    subject: "niche_posts",
    value: "targeted",
    description: `Like recent posts from the ${m.niche} audience`,
    rationale: "Likes on fresh posts surface the profile to people already engaging in the niche.",
    parameters: { dailyQuota: m.aggressive ? 50 : 30, audience: audienceOf(m, context) },
  },
  {
    kind: "engagement_follow",
    subject: "niche accounts",
    value: "targeted",
    description: "Follow accounts that engage with similar creators",
    rationale: "Accounts that already comment on similar creators are the likeliest to follow back.",
    parameters: { dailyQuota: 15, audience: audienceOf(m, context) },
  },
  {
    kind: "posting_frequency",
    subject: "feed",
    value: "4x_weekly",
    description: "Publish four feed posts a week and spend the saved time replying",
    rationale: "Engagement rate per post matters more than volume; fewer posts leave time for the first-hour replies.",
    parameters: { postsPerWeek: 4 },
  },
  {
    kind: "audience_targeting",
    subject: "followers_of_similar_accounts",
    value: "engage_recent_posts",
    description: "Work through followers of similar accounts who posted this week",
    rationale: "Recently active followers of similar accounts respond to engagement within days.",
    parameters: { audience: audienceOf(m, context) },
  },
  {
    kind: "direct_outreach",
    subject: "new_followers",
    value: "welcome_dm",
    description: "Send new followers a short welcome message",
    rationale: "A personal welcome turns a follow into a conversation.",
    parameters: { dailyQuota: 10 },
  },
];

const contentPlaybook: Playbook = (m, context): Recommendation[] => [
  {
    kind: "content_theme",
    subject: "reels",
    value: context.experienceLevel === "beginner" ? "behind_the_scenes" : "educational",
    description: context.experienceLevel === "beginner"
      ? "Short behind-the-scenes reels from the daily routine"
      : `Short educational reels with one ${m.niche} tip each`,
    rationale: "Reels reach non-followers more than any other format.",
    parameters: { postsPerWeek: 3 },
  },
  {
    kind: "content_theme",
    subject: "carousel",
    value: "how_to",
    description: "Step-by-step carousels that are worth saving",
    rationale: "Saves and shares are the strongest ranking signals for carousels.",
    parameters: { postsPerWeek: 2 },
  },
  {
    kind: "posting_frequency",
    subject: "story",
    value: "daily",
    description: "Post stories every day",
    rationale: "Daily stories keep existing followers seeing the account between posts.",
    parameters: { storiesPerDay: 3 },
  },
  {
    kind: "hashtag_strategy",
    subject: "hashtags",
    value: "niche_specific",
    description: "Use a small set of niche-specific hashtags",
    rationale: "Content is classified from the media itself, so a few precise tags beat a long list.",
    parameters: { hashtagsPerPost: 5, seedTopics: [m.niche] },
  },
];

const funnelPlaybook: Playbook = (m, context): Recommendation[] => [
  {
    kind: "audience_targeting",
    subject: "profile",
    value: "bio_call_to_action",
    description: "Rewrite the bio around one promise and one call to action",
    rationale: "Profile visits only turn into follows when the bio says what the account is for.",
    parameters: { audience: audienceOf(m, context) },
  },
  {
    kind: "direct_outreach",
    subject: "new_followers",
    value: "lead_magnet_dm",
    description: "Offer new followers a free guide by message",
    rationale: "A lead magnet moves followers one step further down the funnel.",
    parameters: { dailyQuota: 10 },
  },
  {
    kind: "analytics_review",
    subject: "growth metrics",
    value: "weekly",
    description: "Track profile visits to follows conversion weekly",
    rationale: "The visit to follow ratio shows whether the profile converts.",
    parameters: { metrics: ["profile_visits", "followers_count"] },
  },
];

export const PLAYBOOKS: Record<SpecialistId, Playbook> = {
  growth: growthPlaybook,
  engagement: engagementPlaybook,
  content: contentPlaybook,
  funnel: funnelPlaybook,
};

const FOCUS: Record<SpecialistId, string> = {
  growth: "Growth focus: maximise reach and follower acquisition.",
  engagement: "Engagement focus: grow through consistent interaction with the niche.",
  content: "Content focus: formats the algorithm distributes to non-followers.",
  funnel: "Funnel focus: convert profile visits into followers and leads.",
};

export function runPlaybook(
  specialist: SpecialistId,
  context: GoalContext,
  research: ResearchResult | null,
): StrategyProposal {
  const metrics = goalMetrics(context);
  return {
    specialistName: specialist,
    recommendations: PLAYBOOKS[specialist](metrics, context),
    rationale: [FOCUS[specialist], researchSignal(research)].filter(Boolean).join(" "),
  };
}

function researchSignal(research: ResearchResult | null): string {
  const top = research?.insights[0];
  if (!top) {
    return "";
  }
  const label = top.simulated ? "Playbook signal" : "Research signal";
  return `${label}: ${top.summaryText.replace(/\s+/g, " ").trim()}`;
}
