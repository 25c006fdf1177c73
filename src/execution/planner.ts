/**
 * Execution Planner
 *
 * Compiles a Strategy into an ordered ExecutionPlan. Each recommendation
 * maps to one or more task categories through a fixed table. Research and
 * analytics tasks run first; the remaining tasks alternate between
 * categories so no single kind of action runs in a burst. Offsets are
 * spread evenly over the timeframe but never closer than the spacing floor.
 *
 * Planning is deterministic: the same strategy, context and options give
 * the same plan.
 */

import { createHash } from "node:crypto";
import type {
  ExecutionPlan,
  GoalContext,
  RecommendationKind,
  Strategy,
  Task,
  TaskCategory,
  UnifiedRecommendation,
} from "../types.js";
import { goalMetrics } from "../strategy/playbooks.js";

export const KIND_TO_CATEGORIES: Record<RecommendationKind, readonly TaskCategory[]> = {
  posting_frequency: ["content-posting"],
  content_theme: ["content-posting"],
  engagement_like: ["engagement-like"],
  engagement_follow: ["engagement-follow"],
  hashtag_strategy: ["hashtag-research"],
  audience_targeting: ["audience-research"],
  analytics_review: ["analytics-pull"],
  direct_outreach: ["direct-message"],
  collaboration: ["audience-research", "direct-message"],
};

const LEADING_CATEGORIES: ReadonlySet<TaskCategory> = new Set([
  "hashtag-research",
  "audience-research",
  "analytics-pull",
]);

const CATEGORY_PROFILE: Record<TaskCategory, { priority: number; estimatedDurationMinutes: number }> = {
  "engagement-like": { priority: 1, estimatedDurationMinutes: 180 },
  "engagement-follow": { priority: 2, estimatedDurationMinutes: 90 },
  "audience-research": { priority: 2, estimatedDurationMinutes: 60 },
  "content-posting": { priority: 2, estimatedDurationMinutes: 30 },
  "direct-message": { priority: 2, estimatedDurationMinutes: 30 },
  "hashtag-research": { priority: 3, estimatedDurationMinutes: 20 },
  "analytics-pull": { priority: 3, estimatedDurationMinutes: 10 },
};

/** Hours of automated activity assumed per day when capping daily quotas. */
export const ACTIVE_HOURS_PER_DAY = 8;

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

export interface PlannerOptions {
  minSpacingMinutes: number;
  maxLikesPerHour: number;
  maxFollowsPerHour: number;
  planId?: string;
  now?: () => Date;
}

type DraftTask = Omit<Task, "taskId" | "scheduledOffsetMs">;

export function buildExecutionPlan(
  strategy: Strategy,
  context: GoalContext,
  options: PlannerOptions,
): ExecutionPlan {
  const { timeframeDays } = goalMetrics(context);
  const planId = options.planId ?? derivePlanId(strategy, context);

  const drafts = strategy.unifiedRecommendations.flatMap((recommendation) =>
    KIND_TO_CATEGORIES[recommendation.kind].map((category) => draftTask(recommendation, category, options)));

  const ordered = [
    ...drafts.filter((draft) => LEADING_CATEGORIES.has(draft.category)),
    ...interleaveByCategory(drafts.filter((draft) => !LEADING_CATEGORIES.has(draft.category))),
  ];

  const spacingMs = spacingFor(ordered.length, timeframeDays, options.minSpacingMinutes);
  const tasks: Task[] = ordered.map((draft, index) => ({
    taskId: `${planId}-t${index + 1}`,
    scheduledOffsetMs: index * spacingMs,
    ...draft,
  }));

  return {
    planId,
    tasks,
    timeframeDays,
    createdAt: (options.now ?? (() => new Date()))().toISOString(),
  };
}

function draftTask(
  recommendation: UnifiedRecommendation,
  category: TaskCategory,
  options: PlannerOptions,
): DraftTask {
  const parameters: Task["parameters"] = {
    ...recommendation.parameters,
    subject: recommendation.subject,
    value: recommendation.value,
  };

  const hourlyCeiling = category === "engagement-like"
    ? options.maxLikesPerHour
    : category === "engagement-follow"
      ? options.maxFollowsPerHour
      : null;

  if (hourlyCeiling !== null) {
    parameters.maxPerHour = hourlyCeiling;
    const quota = parameters.dailyQuota;
    if (typeof quota === "number") {
      parameters.dailyQuota = Math.min(Math.max(0, Math.floor(quota)), hourlyCeiling * ACTIVE_HOURS_PER_DAY);
    }
  }

  return {
    category,
    priority: CATEGORY_PROFILE[category].priority,
    estimatedDurationMinutes: CATEGORY_PROFILE[category].estimatedDurationMinutes,
    sourceRecommendation: recommendation.key,
    parameters,
  };
}

/**
 * Round-robin over categories in order of first appearance; within a
 * category the original order is kept.
 */
export function interleaveByCategory<T extends { category: TaskCategory }>(items: T[]): T[] {
  const queues = new Map<TaskCategory, T[]>();
  for (const item of items) {
    const queue = queues.get(item.category);
    if (queue) {
      queue.push(item);
    } else {
      queues.set(item.category, [item]);
    }
  }

  const result: T[] = [];
  const lanes = [...queues.values()];
  for (let round = 0; result.length < items.length; round += 1) {
    for (const lane of lanes) {
      if (round < lane.length) {
        result.push(lane[round]);
      }
    }
  }
  return result;
}

export function spacingFor(taskCount: number, timeframeDays: number, minSpacingMinutes: number): number {
  const floor = minSpacingMinutes * MS_PER_MINUTE;
  if (taskCount <= 1) {
    return floor;
  }
  const even = Math.floor((timeframeDays * MS_PER_DAY) / taskCount);
  return Math.max(floor, even);
}

function derivePlanId(strategy: Strategy, context: GoalContext): string {
  const digest = createHash("sha256")
    .update(JSON.stringify({ keys: strategy.unifiedRecommendations.map((entry) => [entry.key, entry.value]), context }))
    .digest("hex");
  return `plan-${digest.slice(0, 12)}`;
}
