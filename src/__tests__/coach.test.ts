import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createGrowthCoach, type GrowthCoach } from "../coach.js";
import { normalizeConfig } from "../config.js";
import type { AutomationBackend } from "../execution/automation-client.js";
import { SqliteKvStore } from "../state/sqlite-store.js";

const GOAL_MESSAGE = "I'm a fitness coach and want to grow from 500 to 5000 followers in 60 days";

function instantBackend(): AutomationBackend {
  let next = 0;
  return {
    enqueue: vi.fn(async () => {
      next += 1;
      return `h-${next}`;
    }),
    status: vi.fn(async () => ({ state: "completed" as const })),
  };
}

describe("GrowthCoach", () => {
  let store: SqliteKvStore;
  let backend: AutomationBackend;
  let coach: GrowthCoach;

  beforeEach(async () => {
    store = SqliteKvStore.open(":memory:");
    backend = instantBackend();
    const config = normalizeConfig({
      dispatcher: { minDelayMs: 0, jitterMs: 0, pollIntervalMs: 1, backoffBaseMs: 1 },
    });
    coach = await createGrowthCoach(config, {
      stores: { primary: store, localFallback: null },
      backend,
      providers: [],
      inference: null,
      embedder: null,
      env: {},
    });
  });

  afterEach(async () => {
    await coach.close();
  });

  it("takes a complete goal to a running execution in one turn", async () => {
    const first = await coach.handleTurn("user-1", GOAL_MESSAGE);

    expect(first.stage).toBe("monitoring");
    expect(first.error).toBeUndefined();
    expect(first.executionId).toMatch(/^exec-/);
    expect(first.responseText).toContain(
      "Some research sources were unavailable, so parts of this plan rely on general playbooks.",
    );
  });

  it("reports completion once every dispatched task finished", async () => {
    const first = await coach.handleTurn("user-1", GOAL_MESSAGE);
    const executionId = first.executionId ?? "";

    const records = await coach.waitForExecution(executionId);
    expect(records?.length).toBeGreaterThan(0);
    expect(records?.every((record) => record.state === "completed")).toBe(true);
    expect(await coach.getExecutionStatus(executionId)).toEqual(records);
    expect(backend.enqueue).toHaveBeenCalledTimes(records?.length ?? 0);

    const second = await coach.handleTurn("user-1", "how is it going?");
    expect(second.stage).toBe("completed");
    expect(second.responseText).toBe(
      `All done: ${records?.length} tasks completed, 0 failed. Reset the session to start a new goal.`,
    );
  });

  it("asks for what is missing", async () => {
    const result = await coach.handleTurn("user-2", "I want to grow my fitness account");

    expect(result.stage).toBe("context_gathering");
    expect(result.executionId).toBeUndefined();
    expect(result.responseText.endsWith("How many followers do you have right now?")).toBe(true);
  });

  it("starts over after a reset", async () => {
    await coach.handleTurn("user-2", "I want to grow my fitness account");

    await coach.resetSession("user-2");
    const result = await coach.handleTurn("user-2", "hello");

    expect(result.stage).toBe("context_gathering");
    expect(result.responseText.endsWith("What niche is your account in (for example fitness, food or travel)?")).toBe(true);
  });

  it("returns null for an unknown execution", async () => {
    expect(await coach.getExecutionStatus("exec-missing")).toBeNull();
  });
});
