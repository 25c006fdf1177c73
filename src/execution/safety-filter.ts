/**
 * Safety Filter
 *
 * Hard policy between the planner and the dispatcher. Rules run in
 * priority order and the first denial wins; a task no rule denies must
 * still be on the allow-list. Every denial is logged as a policy
 * violation with its reason code.
 */

import { createLogger } from "../observability/logger.js";
import type { RejectedTask, Task } from "../types.js";

const logger = createLogger("execution.safety");

export const DENIED_CATEGORIES: readonly string[] = ["direct-message", "content-posting"];

export const ALLOWED_CATEGORIES: readonly string[] = [
  "engagement-like",
  "engagement-follow",
  "hashtag-research",
  "audience-research",
  "analytics-pull",
];

const CREDENTIAL_PATTERN =
  /(?:^|[^a-z])(?:credential|password|passcode|login|2fa|otp)s?(?:[^a-z]|$)|session[-_ ]?(?:cookie|token|hijack)|phish/i;

export interface SafetyPolicy {
  deniedCategories: readonly string[];
  allowedCategories: readonly string[];
}

export const DEFAULT_SAFETY_POLICY: SafetyPolicy = {
  deniedCategories: DENIED_CATEGORIES,
  allowedCategories: ALLOWED_CATEGORIES,
};

export function createSafetyPolicy(extraDeniedCategories: readonly string[] = []): SafetyPolicy {
  return {
    deniedCategories: [...new Set([...DENIED_CATEGORIES, ...extraDeniedCategories])],
    allowedCategories: ALLOWED_CATEGORIES,
  };
}

export interface PolicyViolation {
  rule: string;
  reasonCode: string;
  message: string;
}

interface SafetyRule {
  id: string;
  priority: number;
  evaluate(task: Task, policy: SafetyPolicy): PolicyViolation | null;
}

function deny(rule: string, reasonCode: string, message: string): PolicyViolation {
  return { rule, reasonCode, message };
}

const RULES: SafetyRule[] = [
  {
    id: "safety.credential_harvesting",
    priority: 100,
    evaluate(task) {
      const values = [task.category, ...Object.values(task.parameters).flat().map(String)];
      const hit = values.find((value) => CREDENTIAL_PATTERN.test(value));
      if (!hit) {
        return null;
      }
      return deny(
        "safety.credential_harvesting",
        "CREDENTIAL_HARVESTING",
        `Task ${task.taskId} touches account credentials ("${hit}")`,
      );
    },
  },
  {
    id: "safety.deny_list",
    priority: 200,
    evaluate(task, policy) {
      // Built-in denials hold under any policy.
      if (!DENIED_CATEGORIES.includes(task.category) && !policy.deniedCategories.includes(task.category)) {
        return null;
      }
      const reasonCode = task.category === "direct-message"
        ? "DIRECT_MESSAGE_BLOCKED"
        : task.category === "content-posting"
          ? "CONTENT_POSTING_BLOCKED"
          : "CATEGORY_DENIED";
      return deny("safety.deny_list", reasonCode, `Category "${task.category}" is never automated`);
    },
  },
  {
    id: "safety.allow_list",
    priority: 300,
    evaluate(task, policy) {
      if (policy.allowedCategories.includes(task.category)) {
        return null;
      }
      return deny(
        "safety.allow_list",
        "CATEGORY_NOT_ALLOWED",
        `Category "${task.category}" is not on the automation allow-list`,
      );
    },
  },
];

RULES.sort((a, b) => a.priority - b.priority);

export interface FilterResult {
  allowed: Task[];
  rejected: RejectedTask[];
}

export function evaluateTask(task: Task, policy: SafetyPolicy = DEFAULT_SAFETY_POLICY): PolicyViolation | null {
  for (const rule of RULES) {
    const violation = rule.evaluate(task, policy);
    if (violation) {
      return violation;
    }
  }
  return null;
}

export function filterTasks(tasks: Task[], policy: SafetyPolicy = DEFAULT_SAFETY_POLICY): FilterResult {
  const allowed: Task[] = [];
  const rejected: RejectedTask[] = [];

  for (const task of tasks) {
    const violation = evaluateTask(task, policy);
    if (!violation) {
      allowed.push(task);
      continue;
    }
    logger.warn("Policy violation, task rejected", {
      taskId: task.taskId,
      category: task.category,
      rule: violation.rule,
      reasonCode: violation.reasonCode,
    });
    rejected.push({ task, reasonCode: violation.reasonCode, reason: violation.message });
  }

  logger.info("Safety filter applied", {
    total: tasks.length,
    allowed: allowed.length,
    rejected: rejected.length,
  });

  return { allowed, rejected };
}

export interface SafetyReport {
  totalTasks: number;
  allowedTasks: number;
  rejectedTasks: number;
  allowedPercentage: number;
  rejectedCategories: string[];
}

export function summarizeSafety(result: FilterResult): SafetyReport {
  const totalTasks = result.allowed.length + result.rejected.length;
  return {
    totalTasks,
    allowedTasks: result.allowed.length,
    rejectedTasks: result.rejected.length,
    allowedPercentage: totalTasks === 0 ? 100 : Math.round((result.allowed.length / totalTasks) * 100),
    rejectedCategories: [...new Set(result.rejected.map((entry) => entry.task.category))].sort(),
  };
}
