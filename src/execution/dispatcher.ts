/**
 * Execution Dispatcher
 *
 * Hands safety-approved tasks to the automation backend. `dispatch`
 * returns as soon as the queued records are stored; the tasks then run in
 * the background on the user's queue, one execution per user at a time,
 * with a randomized pause before every action and at most
 * `maxConcurrentPerUser` actions in flight.
 *
 * Every state change rewrites the whole record set. When the primary store
 * refuses a write, the execution moves to the local file store for good
 * and is marked `local-fallback`.
 */

import { ulid } from "ulid";
import { DispatchError, normalizeError } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import type { KvStore } from "../state/kv-store.js";
import { getJson, setJson } from "../state/kv-store.js";
import type { DispatchRecord, DispatchState, ExecutionRecordSet, Task } from "../types.js";
import { isTaskCategory } from "../types.js";
import { sleep as abortableSleep } from "../utils/abort.js";
import type { AutomationBackend } from "./automation-client.js";

const logger = createLogger("execution.dispatcher");

export const DISPATCH_TTL_SECONDS = 7 * 24 * 60 * 60;

export function dispatchKey(executionId: string): string {
  return `dispatch:${executionId}`;
}

export interface ExecutionDispatcherOptions {
  backend: AutomationBackend;
  store: KvStore;
  localFallback: KvStore | null;
  minDelayMs: number;
  jitterMs: number;
  maxConcurrentPerUser: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => Date;
  createId?: () => string;
}

export class ExecutionDispatcher {
  private readonly userQueues = new Map<string, Promise<void>>();
  private readonly runs = new Map<string, Promise<void>>();
  private readonly writeChains = new Map<string, Promise<void>>();
  private readonly controller = new AbortController();
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(private readonly options: ExecutionDispatcherOptions) {
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => `exec-${ulid().toLowerCase()}`);
  }

  async dispatch(userId: string, tasks: Task[]): Promise<string> {
    if (this.controller.signal.aborted) {
      throw new DispatchError("Dispatcher is shut down", { transient: false });
    }

    const executionId = this.createId();
    const timestamp = this.now().toISOString();
    const set: ExecutionRecordSet = {
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
        updatedAt: timestamp,
      })),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.persistInitial(set);
    logger.info("Execution queued", { userId, executionId, tasks: tasks.length, persistence: set.persistence });

    const previous = this.userQueues.get(userId) ?? Promise.resolve();
    const run: Promise<void> = previous
      .then(() => this.execute(set, tasks))
      .catch((error: unknown) => {
        logger.error("Execution run failed", normalizeError(error), { userId, executionId });
      })
      .then(() => {
        this.runs.delete(executionId);
        if (this.userQueues.get(userId) === run) {
          this.userQueues.delete(userId);
        }
      });
    this.userQueues.set(userId, run);
    this.runs.set(executionId, run);

    return executionId;
  }

  /**
   * Reads the primary store and the local fallback. An execution that has
   * moved to the fallback never writes to the primary again, so the
   * fallback copy wins when both exist.
   */
  async getStatus(executionId: string): Promise<ExecutionRecordSet | null> {
    const fallback = this.options.localFallback;
    const [primary, local] = await Promise.all([
      this.readFrom(this.options.store, executionId),
      fallback ? this.readFrom(fallback, executionId) : Promise.resolve(null),
    ]);
    return local ?? primary;
  }

  async waitForExecution(executionId: string): Promise<ExecutionRecordSet | null> {
    await this.runs.get(executionId);
    await this.writeChains.get(executionId);
    return this.getStatus(executionId);
  }

  isRunning(executionId: string): boolean {
    return this.runs.has(executionId);
  }

  /** Aborts in-flight runs and waits for them to record their final state. */
  async shutdown(): Promise<void> {
    this.controller.abort();
    await Promise.all([...this.runs.values()]);
    await Promise.all([...this.writeChains.values()]);
  }

  private async execute(set: ExecutionRecordSet, tasks: Task[]): Promise<void> {
    const signal = this.controller.signal;
    let cursor = 0;
    // Pauses are chained so consecutive enqueues are spaced even across workers.
    let pace: Promise<void> = Promise.resolve();
    const nextSlot = (): Promise<void> => {
      pace = pace.then(() => this.sleep(this.humanizedDelay(), signal));
      return pace;
    };

    const worker = async (): Promise<void> => {
      while (cursor < tasks.length && !signal.aborted) {
        const index = cursor;
        cursor += 1;
        await this.runTask(set, set.records[index], tasks[index], nextSlot(), signal);
      }
    };

    const workers = Math.max(1, Math.min(this.options.maxConcurrentPerUser, tasks.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (signal.aborted) {
      for (const record of set.records) {
        if (record.state === "queued" || record.state === "in_progress") {
          this.update(set, record, "failed", { lastError: "Cancelled: dispatcher shut down" });
        }
      }
      this.persist(set);
    }

    const summary = countStates(set.records);
    logger.info("Execution finished", { userId: set.userId, executionId: set.executionId, ...summary });
  }

  private async runTask(
    set: ExecutionRecordSet,
    record: DispatchRecord,
    task: Task,
    slot: Promise<void>,
    signal: AbortSignal,
  ): Promise<void> {
    const context = { executionId: set.executionId, taskId: task.taskId };

    try {
      await slot;
    } catch {
      // Shut down while waiting; execute() marks the record.
      return;
    }

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      this.update(set, record, "in_progress", { attempts: attempt });
      this.persist(set);

      try {
        const handle = await this.options.backend.enqueue(set.userId, task, signal);
        this.update(set, record, "in_progress", { handle });
        this.persist(set);

        const outcome = await this.pollUntilDone(handle, signal);
        if (outcome.state === "completed") {
          this.update(set, record, "completed", { lastError: null });
          this.persist(set);
          logger.info("Task completed", { ...context, attempts: attempt });
        } else {
          this.update(set, record, "failed", { lastError: outcome.error ?? "Backend reported failure" });
          this.persist(set);
          logger.warn("Task failed in backend", { ...context, error: record.lastError });
        }
        return;
      } catch (error) {
        if (signal.aborted) {
          return;
        }

        const err = normalizeError(error);
        const transient = err instanceof DispatchError && err.transient;
        if (!transient || attempt >= this.options.maxAttempts) {
          this.update(set, record, "failed", { lastError: err.message });
          this.persist(set);
          logger.warn("Task failed", { ...context, attempts: attempt, transient, error: err.message });
          return;
        }

        const backoffMs = this.backoffFor(attempt);
        this.update(set, record, "in_progress", { lastError: err.message });
        this.persist(set);
        logger.warn("Transient dispatch error, retrying", { ...context, attempt, backoffMs, error: err.message });

        try {
          await this.sleep(backoffMs, signal);
        } catch {
          return;
        }
      }
    }
  }

  private async pollUntilDone(
    handle: string,
    signal: AbortSignal,
  ): Promise<{ state: "completed" | "failed"; error?: string }> {
    const intervalMs = Math.max(1, this.options.pollIntervalMs);
    let waitedMs = 0;

    while (true) {
      try {
        const status = await this.options.backend.status(handle, signal);
        if (status.state === "completed" || status.state === "failed") {
          return { state: status.state, error: status.error };
        }
      } catch (error) {
        const err = normalizeError(error);
        if (signal.aborted || !(err instanceof DispatchError) || !err.transient) {
          throw err;
        }
        logger.debug("Status poll failed, polling again", { handle, error: err.message });
      }

      if (waitedMs >= this.options.pollTimeoutMs) {
        throw new DispatchError(
          `Task ${handle} did not finish within ${this.options.pollTimeoutMs}ms`,
          { transient: false },
        );
      }
      await this.sleep(this.options.pollIntervalMs, signal);
      waitedMs += intervalMs;
    }
  }

  private humanizedDelay(): number {
    return Math.round(this.options.minDelayMs + this.random() * this.options.jitterMs);
  }

  private backoffFor(attempt: number): number {
    return Math.min(this.options.backoffMaxMs, this.options.backoffBaseMs * 2 ** (attempt - 1));
  }

  private update(
    set: ExecutionRecordSet,
    record: DispatchRecord,
    state: DispatchState,
    changes: Partial<Pick<DispatchRecord, "attempts" | "lastError" | "handle">> = {},
  ): void {
    const timestamp = this.now().toISOString();
    Object.assign(record, changes, { state, updatedAt: timestamp });
    set.updatedAt = timestamp;
  }

  private async persistInitial(set: ExecutionRecordSet): Promise<void> {
    const fallback = this.options.localFallback;
    try {
      await setJson(this.options.store, dispatchKey(set.executionId), set, DISPATCH_TTL_SECONDS);
      return;
    } catch (error) {
      if (!fallback) {
        throw new DispatchError(
          `Could not store execution ${set.executionId}: ${normalizeError(error).message}`,
          { transient: true },
        );
      }
      logger.warn("Primary store rejected dispatch records, using local fallback", {
        executionId: set.executionId,
        error: normalizeError(error).message,
      });
    }

    set.persistence = "local-fallback";
    await setJson(fallback, dispatchKey(set.executionId), set, DISPATCH_TTL_SECONDS);
  }

  /**
   * Queues a write behind earlier writes of the same execution. Each write
   * serializes the set as it is when the write runs, so the stores always
   * end on the latest state.
   */
  private persist(set: ExecutionRecordSet): void {
    const previous = this.writeChains.get(set.executionId) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => this.writeRecordSet(set))
      .then(() => {
        if (this.writeChains.get(set.executionId) === next) {
          this.writeChains.delete(set.executionId);
        }
      });
    this.writeChains.set(set.executionId, next);
  }

  private async writeRecordSet(set: ExecutionRecordSet): Promise<void> {
    const key = dispatchKey(set.executionId);
    const fallback = this.options.localFallback;

    if (set.persistence === "primary") {
      try {
        await setJson(this.options.store, key, set, DISPATCH_TTL_SECONDS);
        return;
      } catch (error) {
        if (!fallback) {
          logger.error("Could not persist dispatch records", normalizeError(error), {
            executionId: set.executionId,
          });
          return;
        }
        logger.warn("Primary store rejected dispatch records, using local fallback", {
          executionId: set.executionId,
          error: normalizeError(error).message,
        });
        set.persistence = "local-fallback";
      }
    }

    if (!fallback) {
      return;
    }
    try {
      await setJson(fallback, key, set, DISPATCH_TTL_SECONDS);
    } catch (error) {
      logger.error("Local fallback rejected dispatch records", normalizeError(error), {
        executionId: set.executionId,
      });
    }
  }

  private async readFrom(store: KvStore, executionId: string): Promise<ExecutionRecordSet | null> {
    try {
      return await getJson(store, dispatchKey(executionId), parseRecordSet);
    } catch (error) {
      logger.warn("Could not read dispatch records", {
        executionId,
        store: store.kind,
        error: normalizeError(error).message,
      });
      return null;
    }
  }
}

export function countStates(records: DispatchRecord[]): Record<DispatchState, number> {
  const counts: Record<DispatchState, number> = { queued: 0, in_progress: 0, completed: 0, failed: 0 };
  for (const record of records) {
    counts[record.state] += 1;
  }
  return counts;
}

export function isExecutionFinished(set: ExecutionRecordSet): boolean {
  return set.records.every((record) => record.state === "completed" || record.state === "failed");
}

const DISPATCH_STATES: readonly DispatchState[] = ["queued", "in_progress", "completed", "failed"];

export function parseRecordSet(value: unknown): ExecutionRecordSet {
  const record = asObject(value, "execution record set");
  const records = Array.isArray(record.records) ? record.records : null;
  if (
    typeof record.executionId !== "string"
    || typeof record.userId !== "string"
    || (record.persistence !== "primary" && record.persistence !== "local-fallback")
    || records === null
    || typeof record.createdAt !== "string"
    || typeof record.updatedAt !== "string"
  ) {
    throw new Error("execution record set has an unexpected shape");
  }

  return {
    executionId: record.executionId,
    userId: record.userId,
    persistence: record.persistence,
    records: records.map((entry, index) => parseDispatchRecord(entry, `records[${index}]`)),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

function parseDispatchRecord(value: unknown, path: string): DispatchRecord {
  const record = asObject(value, path);
  const state = DISPATCH_STATES.find((candidate) => candidate === record.state);
  if (
    typeof record.taskId !== "string"
    || typeof record.category !== "string"
    || !isTaskCategory(record.category)
    || !state
    || typeof record.attempts !== "number"
    || typeof record.updatedAt !== "string"
  ) {
    throw new Error(`${path} has an unexpected shape`);
  }

  return {
    taskId: record.taskId,
    category: record.category,
    state,
    attempts: record.attempts,
    lastError: typeof record.lastError === "string" ? record.lastError : null,
    handle: typeof record.handle === "string" ? record.handle : null,
    updatedAt: record.updatedAt,
  };
}

function asObject(value: unknown, path: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${path} must be an object`);
  }
  return value as Record<string, unknown>;
}
