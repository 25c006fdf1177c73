import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { GREETING } from "../../conversation/responses.js";
import { ConversationOrchestrator, type TurnResult } from "../../conversation/state-machine.js";
import {
  InvalidTransitionError,
  SessionNotFoundError,
  StrategyUnavailableError,
  TurnCancelledError,
} from "../../errors.js";
import type { ExecutionDispatcher } from "../../execution/dispatcher.js";
import { DEFAULT_SAFETY_POLICY } from "../../execution/safety-filter.js";
import type { ResearchCoordinator } from "../../research/coordinator.js";
import { buildResearchQuery, fingerprintQuery } from "../../research/query.js";
import { SessionStore, sessionKey } from "../../state/session-store.js";
import { SqliteKvStore } from "../../state/sqlite-store.js";
import { UserLock } from "../../state/user-lock.js";
import { HeuristicSpecialist } from "../../strategy/specialists.js";
import { StrategySynthesisEngine } from "../../strategy/synthesis-engine.js";
import {
  CONVERSATION_STAGES,
  SPECIALIST_IDS,
  type ConversationStage,
  type ExecutionRecordSet,
  type ResearchResult,
  type Task,
} from "../../types.js";
import { fitnessContext } from "../helpers.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");
const GOAL = {
  niche: "fitness",
  currentFollowers: 500,
  targetFollowers: 5000,
  timeframeDays: 60,
};

function researchResult(query: string, degraded = false): ResearchResult {
  return {
    queryFingerprint: fingerprintQuery(query),
    query,
    intent: "growth_research",
    insights: [],
    degraded,
    synthesizedSummary: "Short reels with a hook in the first second grow fastest.",
    providersSucceeded: degraded ? [] : ["tavily", "serpapi"],
    providersFailed: degraded ? ["tavily", "serpapi"] : [],
    reranked: false,
    cachedAt: NOW.toISOString(),
    ttlSeconds: 600,
  };
}

class FakeDispatcher implements Pick<ExecutionDispatcher, "dispatch" | "getStatus"> {
  readonly sets = new Map<string, ExecutionRecordSet>();
  readonly dispatched: Task[][] = [];

  async dispatch(userId: string, tasks: Task[]): Promise<string> {
    const executionId = `exec-${this.sets.size + 1}`;
    this.dispatched.push(tasks);
    this.sets.set(executionId, {
      executionId,
      userId,
      persistence: "primary",
      records: tasks.map((task) => ({
        taskId: task.taskId,
        category: task.category,
        state: "queued",
        attempts: 0,
        lastError: null,
        handle: null,
        updatedAt: NOW.toISOString(),
      })),
      createdAt: NOW.toISOString(),
      updatedAt: NOW.toISOString(),
    });
    return executionId;
  }

  async getStatus(executionId: string): Promise<ExecutionRecordSet | null> {
    return this.sets.get(executionId) ?? null;
  }

  finish(executionId: string): void {
    const set = this.sets.get(executionId);
    for (const record of set?.records ?? []) {
      record.state = "completed";
      record.attempts = 1;
    }
  }
}

describe("ConversationOrchestrator", () => {
  let store: SqliteKvStore;
  let sessions: SessionStore;
  let dispatcher: FakeDispatcher;
  let engine: StrategySynthesisEngine;
  let research: Mock<ResearchCoordinator["research"]>;
  let synthesize: Mock<StrategySynthesisEngine["synthesize"]>;
  let orchestrator: ConversationOrchestrator;

  beforeEach(() => {
    store = SqliteKvStore.open(":memory:");
    sessions = new SessionStore(store);
    dispatcher = new FakeDispatcher();
    engine = new StrategySynthesisEngine({
      specialists: SPECIALIST_IDS.map((id) => new HeuristicSpecialist(id)),
      timeoutMs: 1_000,
    });
    research = vi.fn<ResearchCoordinator["research"]>(async (query) => researchResult(query));
    synthesize = vi.fn<StrategySynthesisEngine["synthesize"]>((context, result, opts) =>
      engine.synthesize(context, result, opts));
    orchestrator = new ConversationOrchestrator({
      sessions,
      lock: new UserLock({ store, distributed: false, lockTtlMs: 1_000, waitTimeoutMs: 1_000 }),
      research: { research },
      strategy: { synthesize },
      dispatcher,
      planner: { minSpacingMinutes: 30, maxLikesPerHour: 60, maxFollowsPerHour: 30 },
      safetyPolicy: DEFAULT_SAFETY_POLICY,
      surfaceDegradedToUser: true,
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await store.close();
  });

  it("goes from context gathering straight to research when the goal is complete", async () => {
    const result = await orchestrator.advance("user-1", { create: true, context: GOAL });

    expect(result.transitions).toEqual([
      "context_gathering",
      "researching",
      "strategizing",
      "planning",
      "executing",
      "monitoring",
    ]);
    expect(result.stage).toBe("monitoring");
    expect(result.executionId).toBe("exec-1");
    expect(result.error).toBeNull();
    expect(research).toHaveBeenCalledTimes(1);
    expect(research.mock.calls[0][0]).toBe(buildResearchQuery(fitnessContext()));
    expect(result.response).toContain(
      "7 of 13 tasks approved for automation (54%). Left for you to do by hand: content-posting, direct-message.",
    );
    expect(result.response).not.toContain("How many followers");
  });

  it("never hands deny-listed tasks to the dispatcher", async () => {
    await orchestrator.advance("user-1", { create: true, context: GOAL });

    const categories = dispatcher.dispatched[0].map((task) => task.category);
    expect(categories).toHaveLength(7);
    expect(categories).not.toContain("direct-message");
    expect(categories).not.toContain("content-posting");

    const saved = await sessions.load("user-1");
    expect(saved?.rejectedTasks.map((entry) => entry.reasonCode)).toEqual([
      "CONTENT_POSTING_BLOCKED",
      "DIRECT_MESSAGE_BLOCKED",
      "CONTENT_POSTING_BLOCKED",
      "DIRECT_MESSAGE_BLOCKED",
      "CONTENT_POSTING_BLOCKED",
      "CONTENT_POSTING_BLOCKED",
    ]);
  });

  it("asks one follow-up question for the first missing field", async () => {
    const result = await orchestrator.advance("user-2", { create: true, message: "I want to grow my fitness account" });

    expect(result.stage).toBe("context_gathering");
    expect(result.transitions).toEqual(["context_gathering"]);
    expect(result.response).toBe(`${GREETING}\n\nHow many followers do you have right now?`);
    expect(research).not.toHaveBeenCalled();
  });

  it("only ever moves stages forward across turns", async () => {
    const turns: TurnResult[] = [];
    turns.push(await orchestrator.advance("user-2", { create: true, message: "I want to grow my fitness account" }));
    turns.push(await orchestrator.advance("user-2", { message: "I have 500 followers and want to reach 5k in 60 days" }));
    dispatcher.finish("exec-1");
    turns.push(await orchestrator.advance("user-2", { message: "how is it going?" }));
    turns.push(await orchestrator.advance("user-2", {}));

    const stages: ConversationStage[] = turns.map((turn) => turn.stage);
    expect(stages).toEqual(["context_gathering", "monitoring", "completed", "completed"]);
    const indexes = stages.map((stage) => CONVERSATION_STAGES.findIndex((candidate) => candidate === stage));
    expect(indexes).toEqual([...indexes].sort((a, b) => a - b));
    expect(turns[2].response).toBe(
      "All done: 7 tasks completed, 0 failed. Reset the session to start a new goal.",
    );
  });

  it("reports progress while the execution runs", async () => {
    await orchestrator.advance("user-1", { create: true, context: GOAL });

    const result = await orchestrator.advance("user-1", {});

    expect(result).toMatchObject({
      stage: "monitoring",
      transitions: [],
      response: "Progress: 0 of 7 tasks finished (0 completed, 0 failed).",
    });
  });

  it("persists the session after the turn", async () => {
    await orchestrator.advance("user-1", { create: true, context: GOAL });

    const saved = await sessions.load("user-1");
    expect(saved?.stage).toBe("monitoring");
    expect(saved?.context).toEqual(fitnessContext());
    expect(saved?.researchResult?.synthesizedSummary).toBe("Short reels with a hook in the first second grow fastest.");
    expect(saved?.executionPlan?.tasks).toHaveLength(13);
    expect(saved?.history.map((turn) => turn.role)).toEqual(["assistant"]);
  });

  it("mentions degraded research when configured to", async () => {
    research.mockImplementation(async (query) => researchResult(query, true));

    const result = await orchestrator.advance("user-1", { create: true, context: GOAL });

    expect(result.response).toContain(
      "Some research sources were unavailable, so parts of this plan rely on general playbooks.",
    );
    expect(result.stage).toBe("monitoring");
  });

  it("fails with SessionNotFoundError without create", async () => {
    await expect(orchestrator.advance("nobody", { message: "hi" })).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("refuses to force a stage that skips ahead", async () => {
    await expect(
      orchestrator.advance("user-3", { create: true, forceStage: "planning" }),
    ).rejects.toThrow("Cannot move from 'greeting' to 'planning': only the immediate successor can be forced");
    await expect(sessions.load("user-3")).resolves.toBeNull();
  });

  it("refuses to force research before the goal is known", async () => {
    await orchestrator.advance("user-3", { create: true, message: "hello" });

    const pending = orchestrator.advance("user-3", { forceStage: "researching" });

    await expect(pending).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(pending).rejects.toThrow("goal context is incomplete");
    expect((await sessions.load("user-3"))?.stage).toBe("context_gathering");
  });

  it("accepts forcing the immediate successor when its guard holds", async () => {
    const result = await orchestrator.advance("user-3", { create: true, forceStage: "context_gathering" });

    expect(result.transitions).toEqual(["context_gathering"]);
    expect(result.stage).toBe("context_gathering");
    expect(result.response).toBe("What niche is your account in (for example fitness, food or travel)?");
  });

  it("parks a failing stage in error and resumes from it", async () => {
    synthesize.mockRejectedValueOnce(new StrategyUnavailableError([{ specialist: "growth", error: "boom" }]));

    const failed = await orchestrator.advance("user-1", { create: true, context: GOAL });

    expect(failed.stage).toBe("error");
    expect(failed.transitions).toEqual(["context_gathering", "researching", "strategizing", "error"]);
    expect(failed.error).toEqual({
      code: "SYNTHESIS_UNAVAILABLE",
      message: "No specialist produced a proposal (growth: boom)",
      retryable: true,
    });
    const parked = await sessions.load("user-1");
    expect(parked).toMatchObject({ stage: "error", resumeStage: "strategizing" });
    expect(parked?.researchResult).not.toBeNull();

    const resumed = await orchestrator.advance("user-1", {});

    expect(resumed.transitions).toEqual(["strategizing", "planning", "executing", "monitoring"]);
    expect(resumed.stage).toBe("monitoring");
    expect(research).toHaveBeenCalledTimes(1);
    expect((await sessions.load("user-1"))?.lastError).toBeNull();
  });

  it("keeps persisted progress when the turn is cancelled", async () => {
    const controller = new AbortController();
    research.mockImplementation(async () => {
      controller.abort();
      throw new TurnCancelledError("researching");
    });

    const result = await orchestrator.advance("user-1", { create: true, context: GOAL, signal: controller.signal });

    expect(result.stage).toBe("researching");
    expect(result.error).toEqual({ code: "TURN_CANCELLED", message: "Turn cancelled during 'researching'", retryable: true });
    expect((await sessions.load("user-1"))?.stage).toBe("researching");
    expect(synthesize).not.toHaveBeenCalled();
  });

  it("serializes turns for the same user", async () => {
    research.mockImplementation(async (query) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return researchResult(query);
    });

    const [first, second] = await Promise.all([
      orchestrator.advance("user-1", { create: true, context: GOAL }),
      orchestrator.advance("user-1", { create: true }),
    ]);

    expect(first.stage).toBe("monitoring");
    expect(second).toMatchObject({ stage: "monitoring", transitions: [] });
    expect(research).toHaveBeenCalledTimes(1);
    expect(dispatcher.dispatched).toHaveLength(1);
  });

  it("starts over on reset", async () => {
    await orchestrator.advance("user-1", { create: true, context: GOAL });

    const result = await orchestrator.advance("user-1", { reset: true });

    expect(result.stage).toBe("context_gathering");
    expect(result.response).toBe(
      `${GREETING}\n\nWhat niche is your account in (for example fitness, food or travel)?`,
    );
    expect((await sessions.load("user-1"))?.executionId).toBeNull();
  });

  it("resets only after the running turn has finished", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    research.mockImplementation(async (query) => {
      await gate;
      return researchResult(query);
    });

    const turn = orchestrator.advance("user-1", { create: true, context: GOAL });
    await vi.waitFor(() => {
      expect(research).toHaveBeenCalledTimes(1);
    });
    const reset = orchestrator.reset("user-1");
    release();

    expect((await turn).stage).toBe("monitoring");
    await reset;
    expect(await sessions.load("user-1")).toBeNull();
  });

  it("reports the last saved stage when the store stops accepting writes", async () => {
    await orchestrator.advance("user-1", { create: true, context: { niche: "fitness" } });
    const realSet = store.set.bind(store);
    vi.spyOn(store, "set")
      .mockImplementationOnce(realSet)
      .mockRejectedValue(new Error("connection refused"));

    const result = await orchestrator.advance("user-1", { context: GOAL });

    expect(result).toEqual({
      stage: "context_gathering",
      response: "Something went wrong: Could not save session for user 'user-1': connection refused. Send another message to try again.",
      transitions: [],
      executionId: null,
      error: {
        code: "SESSION_STORE_UNAVAILABLE",
        message: "Could not save session for user 'user-1': connection refused",
        retryable: true,
      },
    });
    expect(research).not.toHaveBeenCalled();
    expect((await sessions.load("user-1"))?.stage).toBe("context_gathering");
  });

  it("answers with a non-retryable error for an unreadable session", async () => {
    await store.set(sessionKey("user-1"), "{not json");

    const result = await orchestrator.advance("user-1", { create: true });

    expect(result).toMatchObject({ stage: "error", transitions: [], executionId: null });
    expect(result.error).toMatchObject({ code: "SESSION_STORE_UNAVAILABLE", retryable: false });
    expect(result.response.startsWith("Something went wrong: Stored session for user 'user-1' is unreadable: ")).toBe(true);
    expect(result.response.endsWith("try again.")).toBe(false);
  });
});
