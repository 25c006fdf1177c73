/**
 * User-facing reply text for each stage.
 */

import { countStates } from "../execution/dispatcher.js";
import type { SafetyReport } from "../execution/safety-filter.js";
import type {
  ExecutionPlan,
  ExecutionRecordSet,
  GoalContext,
  ResearchResult,
  Strategy,
} from "../types.js";
import type { ContextField } from "./context-extractor.js";

export const GREETING =
  "Hi! I'm your growth coach. Tell me about your account and your goal, and I'll build a plan with you.";

const FOLLOW_UP_QUESTIONS: Record<ContextField, string> = {
  niche: "What niche is your account in (for example fitness, food or travel)?",
  currentFollowers: "How many followers do you have right now?",
  targetFollowers: "How many followers would you like to reach?",
  timeframeDays: "By when do you want to get there (for example in 60 days or within 3 months)?",
};

export function followUpQuestion(missing: ContextField[], context: GoalContext): string {
  const first = missing[0];
  if (first) {
    return FOLLOW_UP_QUESTIONS[first];
  }
  return `Your target (${context.targetFollowers ?? 0}) needs to be above your current follower count (${context.currentFollowers ?? 0}). What number are you aiming for?`;
}

export function researchReply(result: ResearchResult, surfaceDegraded: boolean): string {
  const lines = [`Research done: ${result.insights.length} insights gathered.`];
  if (result.degraded && surfaceDegraded) {
    lines.push("Some research sources were unavailable, so parts of this plan rely on general playbooks.");
  }
  if (result.synthesizedSummary) {
    lines.push(result.synthesizedSummary);
  }
  return lines.join("\n");
}

export function strategyReply(strategy: Strategy): string {
  const lines = [`${strategy.title}:`];
  for (const recommendation of strategy.unifiedRecommendations) {
    lines.push(`- ${recommendation.description}`);
  }
  return lines.join("\n");
}

export function planReply(plan: ExecutionPlan): string {
  return `Execution plan ${plan.planId}: ${plan.tasks.length} tasks over ${plan.timeframeDays} days.`;
}

export function safetyReply(report: SafetyReport): string {
  const base = `${report.allowedTasks} of ${report.totalTasks} tasks approved for automation (${report.allowedPercentage}%).`;
  if (report.rejectedCategories.length === 0) {
    return base;
  }
  return `${base} Left for you to do by hand: ${report.rejectedCategories.join(", ")}.`;
}

export function dispatchReply(executionId: string): string {
  return `Automation started (execution ${executionId}). Send any message to check progress.`;
}

export function progressReply(set: ExecutionRecordSet): string {
  const counts = countStates(set.records);
  const total = set.records.length;
  const done = counts.completed + counts.failed;
  const parts = [`Progress: ${done} of ${total} tasks finished (${counts.completed} completed, ${counts.failed} failed).`];
  if (set.persistence === "local-fallback") {
    parts.push("Status is being kept locally while the main store is unavailable.");
  }
  return parts.join(" ");
}

export function completedReply(set: ExecutionRecordSet | null): string {
  if (!set) {
    return "Your plan has finished. Reset the session to start a new goal.";
  }
  const counts = countStates(set.records);
  return `All done: ${counts.completed} tasks completed, ${counts.failed} failed. Reset the session to start a new goal.`;
}

export function errorReply(message: string, retryable: boolean): string {
  return retryable
    ? `Something went wrong: ${message}. Send another message to try again.`
    : `Something went wrong: ${message}.`;
}
