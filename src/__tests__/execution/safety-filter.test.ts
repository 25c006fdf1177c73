import { describe, expect, it } from "vitest";
import {
  ALLOWED_CATEGORIES,
  createSafetyPolicy,
  evaluateTask,
  filterTasks,
  summarizeSafety,
} from "../../execution/safety-filter.js";
import { TASK_CATEGORIES, type Task, type TaskCategory } from "../../types.js";

function task(taskId: string, category: TaskCategory, parameters: Task["parameters"] = {}): Task {
  return {
    taskId,
    category,
    scheduledOffsetMs: 0,
    priority: 2,
    estimatedDurationMinutes: 10,
    sourceRecommendation: "k",
    parameters,
  };
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) {
    return [items];
  }
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest]));
}

describe("filterTasks", () => {
  it("allows the allow-list and rejects the deny-list", () => {
    const tasks = TASK_CATEGORIES.map((category, index) => task(`t${index + 1}`, category));

    const result = filterTasks(tasks);

    expect(result.allowed.map((entry) => entry.category)).toEqual([...ALLOWED_CATEGORIES]);
    expect(result.rejected.map((entry) => [entry.task.category, entry.reasonCode])).toEqual([
      ["content-posting", "CONTENT_POSTING_BLOCKED"],
      ["direct-message", "DIRECT_MESSAGE_BLOCKED"],
    ]);
    expect(result.rejected[1].reason).toBe('Category "direct-message" is never automated');
  });

  it("rejects deny-list tasks for every input ordering", () => {
    const tasks = [
      task("dm", "direct-message"),
      task("post", "content-posting"),
      task("like", "engagement-like"),
      task("follow", "engagement-follow"),
    ];

    const orders = permutations(tasks);
    expect(orders).toHaveLength(24);
    for (const order of orders) {
      const result = filterTasks(order);
      expect(result.rejected.map((entry) => entry.task.taskId).sort()).toEqual(["dm", "post"]);
      expect(result.allowed.map((entry) => entry.taskId)).toEqual(
        order.filter((entry) => entry.taskId === "like" || entry.taskId === "follow").map((entry) => entry.taskId),
      );
    }
  });

  it("rejects direct messages even under a policy that allows them", () => {
    const permissive = {
      deniedCategories: [],
      allowedCategories: [...ALLOWED_CATEGORIES, "direct-message", "content-posting"],
    };

    const result = filterTasks([task("dm", "direct-message")], permissive);

    expect(result.allowed).toEqual([]);
    expect(result.rejected[0].reasonCode).toBe("DIRECT_MESSAGE_BLOCKED");
  });

  it("rejects anything that touches credentials", () => {
    const violation = evaluateTask(task("t1", "engagement-like", { action: "collect_passwords" }));

    expect(violation).toEqual({
      rule: "safety.credential_harvesting",
      reasonCode: "CREDENTIAL_HARVESTING",
      message: 'Task t1 touches account credentials ("collect_passwords")',
    });
    expect(evaluateTask(task("t2", "analytics-pull", { metrics: ["followers_count", "daily_reach"] }))).toBeNull();
  });

  it("applies extra denied categories from configuration", () => {
    const result = filterTasks([task("f", "engagement-follow"), task("l", "engagement-like")], createSafetyPolicy(["engagement-follow"]));

    expect(result.allowed.map((entry) => entry.taskId)).toEqual(["l"]);
    expect(result.rejected[0].reasonCode).toBe("CATEGORY_DENIED");
  });

  it("denies categories missing from the allow-list", () => {
    const narrow = { deniedCategories: [], allowedCategories: ["analytics-pull"] };

    const result = filterTasks([task("h", "hashtag-research")], narrow);

    expect(result.rejected).toEqual([
      {
        task: task("h", "hashtag-research"),
        reasonCode: "CATEGORY_NOT_ALLOWED",
        reason: 'Category "hashtag-research" is not on the automation allow-list',
      },
    ]);
  });
});

describe("summarizeSafety", () => {
  it("reports totals and rejected categories", () => {
    const result = filterTasks([
      task("a", "engagement-like"),
      task("b", "direct-message"),
      task("c", "direct-message"),
    ]);

    expect(summarizeSafety(result)).toEqual({
      totalTasks: 3,
      allowedTasks: 1,
      rejectedTasks: 2,
      allowedPercentage: 33,
      rejectedCategories: ["direct-message"],
    });
  });

  it("treats an empty plan as fully allowed", () => {
    expect(summarizeSafety({ allowed: [], rejected: [] }).allowedPercentage).toBe(100);
  });
});
