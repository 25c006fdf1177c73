/**
 * Conversation State Machine
 *
 * Drives one user's session through
 * greeting → context_gathering → researching → strategizing → planning →
 * executing → monitoring → completed.
 *
 * A turn runs stages until one has to wait for the user (missing context,
 * an execution still running, or the terminal stage). The session is saved
 * after every transition, so a failure or cancellation keeps everything
 * done before it. A failing stage parks the session in `error` with
 * `resumeStage` pointing at it; the next turn picks up from there.
 */

import {
  GrowthCoachError,
  InvalidTransitionError,
  SessionNotFoundError,
  SessionStoreError,
  TurnCancelledError,
  normalizeError,
} from "../errors.js";
import type { ExecutionDispatcher } from "../execution/dispatcher.js";
import { isExecutionFinished } from "../execution/dispatcher.js";
import { buildExecutionPlan, type PlannerOptions } from "../execution/planner.js";
import { filterTasks, summarizeSafety, type SafetyPolicy } from "../execution/safety-filter.js";
import { createLogger } from "../observability/logger.js";
import type { ResearchCoordinator } from "../research/coordinator.js";
import { buildResearchQuery } from "../research/query.js";
import { createSession, type SessionStore } from "../state/session-store.js";
import type { UserLock } from "../state/user-lock.js";
import type { StrategySynthesisEngine } from "../strategy/synthesis-engine.js";
import {
  CONVERSATION_STAGES,
  type ConversationSession,
  type ConversationStage,
  type ExecutionRecordSet,
  type SequenceStage,
  type SessionError,
} from "../types.js";
import {
  extractContext,
  isContextComplete,
  mergeContext,
  missingContextFields,
  type ContextUpdate,
} from "./context-extractor.js";
import {
  GREETING,
  completedReply,
  dispatchReply,
  errorReply,
  followUpQuestion,
  planReply,
  progressReply,
  researchReply,
  safetyReply,
  strategyReply,
} from "./responses.js";

const logger = createLogger("conversation.state-machine");

export interface TurnInput {
  message?: string;
  /** Structured goal context; wins over anything parsed from `message`. */
  context?: ContextUpdate;
  forceStage?: ConversationStage;
  /** Discards the stored session and starts over. Implies `create`. */
  reset?: boolean;
  create?: boolean;
  signal?: AbortSignal;
}

export interface TurnResult {
  stage: ConversationStage;
  response: string;
  /** Stages entered during this turn, in order. */
  transitions: ConversationStage[];
  executionId: string | null;
  error: SessionError | null;
}

export interface ConversationOrchestratorOptions {
  sessions: SessionStore;
  lock: UserLock;
  research: Pick<ResearchCoordinator, "research">;
  strategy: Pick<StrategySynthesisEngine, "synthesize">;
  dispatcher: Pick<ExecutionDispatcher, "dispatch" | "getStatus">;
  planner: Omit<PlannerOptions, "planId" | "now">;
  safetyPolicy: SafetyPolicy;
  surfaceDegradedToUser: boolean;
  now?: () => Date;
}

interface Checkpoint {
  stage: ConversationStage;
  transitions: ConversationStage[];
  executionId: string | null;
}

type StageOutcome =
  | { kind: "advance"; next: SequenceStage; reply?: string }
  | { kind: "wait"; reply: string };

export class ConversationOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly options: ConversationOrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs one turn for `userId`. Turns for the same user never overlap.
   * Throws only for caller mistakes (unknown session, forbidden forced
   * stage) and lock timeouts. Stage failures come back as `stage: "error"`;
   * a store failure reports the last stage the store actually holds.
   */
  async advance(userId: string, input: TurnInput = {}): Promise<TurnResult> {
    return this.options.lock.runExclusive(userId, () => this.runTurn(userId, input));
  }

  /** Deletes the session once any running turn for the user has finished. */
  async reset(userId: string): Promise<void> {
    await this.options.lock.runExclusive(userId, () => this.options.sessions.delete(userId));
    logger.info("Session reset", { userId });
  }

  private async runTurn(userId: string, input: TurnInput): Promise<TurnResult> {
    let session: ConversationSession;
    try {
      session = await this.loadSession(userId, input);
    } catch (caught) {
      if (caught instanceof SessionStoreError) {
        return storeFailure(userId, caught, { stage: "error", transitions: [], executionId: null });
      }
      throw caught;
    }

    const saved: Checkpoint = { stage: session.stage, transitions: [], executionId: session.executionId };
    try {
      return await this.playTurn(session, input, saved);
    } catch (caught) {
      if (caught instanceof SessionStoreError) {
        return storeFailure(userId, caught, saved);
      }
      throw caught;
    }
  }

  /** `saved` tracks what the store holds so a failed write reports the last durable state. */
  private async playTurn(session: ConversationSession, input: TurnInput, saved: Checkpoint): Promise<TurnResult> {
    const userId = session.userId;
    const transitions: ConversationStage[] = [];
    const replies: string[] = [];
    const checkpoint = async (): Promise<void> => {
      await this.save(session);
      saved.stage = session.stage;
      saved.transitions = [...transitions];
      saved.executionId = session.executionId;
    };

    if (session.stage === "error") {
      const resumeAt = session.resumeStage ?? "greeting";
      logger.info("Resuming after error", { userId, stage: resumeAt, lastError: session.lastError?.code });
      session.stage = resumeAt;
      session.resumeStage = null;
      session.lastError = null;
      transitions.push(resumeAt);
    }

    if (input.message) {
      session.history.push({ role: "user", content: input.message, at: this.now().toISOString() });
    }
    session.context = mergeContext(
      session.context,
      input.message ? extractContext(input.message) : {},
      input.context ?? {},
    );

    if (input.forceStage && input.forceStage !== session.stage) {
      await this.applyForcedStage(session, input.forceStage);
      transitions.push(input.forceStage);
    }

    await checkpoint();

    let error: SessionError | null = null;
    try {
      while (true) {
        if (input.signal?.aborted) {
          throw new TurnCancelledError(session.stage);
        }

        const outcome = await this.runStage(session, input.signal);
        if (outcome.reply) {
          replies.push(outcome.reply);
        }
        if (outcome.kind === "wait") {
          break;
        }

        this.transition(session, outcome.next);
        transitions.push(outcome.next);
        await checkpoint();
      }
    } catch (caught) {
      if (caught instanceof SessionStoreError) {
        throw caught;
      }
      const err = normalizeError(caught);
      error = toSessionError(err);

      if (err instanceof TurnCancelledError) {
        logger.info("Turn cancelled", { userId, stage: session.stage });
        replies.push("Stopped. Progress so far is saved; send another message to continue.");
      } else {
        logger.error("Stage failed", err, { userId, stage: session.stage });
        session.resumeStage = session.stage;
        session.stage = "error";
        session.lastError = error;
        transitions.push("error");
        replies.push(errorReply(err.message, error.retryable));
      }
    }

    const response = replies.join("\n\n");
    session.history.push({ role: "assistant", content: response, at: this.now().toISOString() });
    await checkpoint();

    return {
      stage: session.stage,
      response,
      transitions,
      executionId: session.executionId,
      error,
    };
  }

  private async loadSession(userId: string, input: TurnInput): Promise<ConversationSession> {
    if (input.reset) {
      await this.options.sessions.delete(userId);
      logger.info("Session reset", { userId });
      return createSession(userId, this.now());
    }

    const existing = await this.options.sessions.load(userId);
    if (existing) {
      return existing;
    }
    if (!input.create) {
      throw new SessionNotFoundError(userId);
    }
    logger.info("Session created", { userId });
    return createSession(userId, this.now());
  }

  private async runStage(session: ConversationSession, signal: AbortSignal | undefined): Promise<StageOutcome> {
    switch (session.stage) {
      case "greeting":
        return { kind: "advance", next: "context_gathering", reply: GREETING };

      case "context_gathering": {
        if (isContextComplete(session.context)) {
          return { kind: "advance", next: "researching" };
        }
        const missing = missingContextFields(session.context);
        return { kind: "wait", reply: followUpQuestion(missing, session.context) };
      }

      case "researching": {
        const query = buildResearchQuery(session.context);
        const result = await this.options.research.research(query, { signal });
        session.researchResult = result;
        if (result.degraded) {
          logger.warn("Continuing with degraded research", {
            userId: session.userId,
            fingerprint: result.queryFingerprint,
          });
        }
        return {
          kind: "advance",
          next: "strategizing",
          reply: researchReply(result, this.options.surfaceDegradedToUser),
        };
      }

      case "strategizing": {
        const strategy = await this.options.strategy.synthesize(session.context, session.researchResult, { signal });
        session.strategy = strategy;
        return { kind: "advance", next: "planning", reply: strategyReply(strategy) };
      }

      case "planning": {
        if (!session.strategy) {
          throw new Error("No strategy to plan from");
        }
        const plan = buildExecutionPlan(session.strategy, session.context, { ...this.options.planner, now: this.now });
        session.executionPlan = plan;
        return { kind: "advance", next: "executing", reply: planReply(plan) };
      }

      case "executing": {
        if (!session.executionPlan) {
          throw new Error("No execution plan to run");
        }
        const filtered = filterTasks(session.executionPlan.tasks, this.options.safetyPolicy);
        session.rejectedTasks = filtered.rejected;
        await this.save(session);

        if (signal?.aborted) {
          throw new TurnCancelledError("executing");
        }
        const executionId = await this.options.dispatcher.dispatch(session.userId, filtered.allowed);
        session.executionId = executionId;
        return {
          kind: "advance",
          next: "monitoring",
          reply: `${safetyReply(summarizeSafety(filtered))}\n${dispatchReply(executionId)}`,
        };
      }

      case "monitoring": {
        const set = await this.readExecution(session);
        if (isExecutionFinished(set)) {
          return { kind: "advance", next: "completed" };
        }
        return { kind: "wait", reply: progressReply(set) };
      }

      case "completed": {
        const set = session.executionId ? await this.options.dispatcher.getStatus(session.executionId) : null;
        return { kind: "wait", reply: completedReply(set) };
      }

      case "error":
        throw new Error("Session is in the error stage");
    }
  }

  private async readExecution(session: ConversationSession): Promise<ExecutionRecordSet> {
    if (!session.executionId) {
      throw new Error("No execution to monitor");
    }
    const set = await this.options.dispatcher.getStatus(session.executionId);
    if (!set) {
      throw new Error(`No dispatch records found for execution ${session.executionId}`);
    }
    return set;
  }

  /**
   * A caller may force the current stage or its immediate successor, and
   * only when the successor's entry guard holds.
   */
  private async applyForcedStage(session: ConversationSession, target: ConversationStage): Promise<void> {
    const from = session.stage;
    if (target === "error" || from === "error") {
      throw new InvalidTransitionError(from, target, "the error stage cannot be forced");
    }
    if (stageIndex(target) !== stageIndex(from) + 1) {
      throw new InvalidTransitionError(from, target, "only the immediate successor can be forced");
    }
    const blocked = await this.entryGuardFailure(session, target);
    if (blocked) {
      throw new InvalidTransitionError(from, target, blocked);
    }
    this.transition(session, target);
  }

  private async entryGuardFailure(session: ConversationSession, target: SequenceStage): Promise<string | null> {
    switch (target) {
      case "greeting":
      case "context_gathering":
        return null;
      case "researching":
        return isContextComplete(session.context) ? null : "goal context is incomplete";
      case "strategizing":
        return session.researchResult ? null : "no research result";
      case "planning":
        return session.strategy ? null : "no strategy";
      case "executing":
        return session.executionPlan ? null : "no execution plan";
      case "monitoring":
        return session.executionId ? null : "nothing has been dispatched";
      case "completed": {
        const set = session.executionId ? await this.options.dispatcher.getStatus(session.executionId) : null;
        return set && isExecutionFinished(set) ? null : "the execution has not finished";
      }
    }
  }

  private transition(session: ConversationSession, next: SequenceStage): void {
    const from = session.stage;
    if (from !== "error" && stageIndex(next) <= stageIndex(from)) {
      throw new InvalidTransitionError(from, next, "stages only move forward");
    }
    session.stage = next;
    session.updatedAt = this.now().toISOString();
    logger.info("Stage transition", { userId: session.userId, from, to: next });
  }

  private async save(session: ConversationSession): Promise<void> {
    session.updatedAt = this.now().toISOString();
    await this.options.sessions.save(session);
  }
}

function stageIndex(stage: SequenceStage): number {
  return CONVERSATION_STAGES.indexOf(stage);
}

function storeFailure(userId: string, error: SessionStoreError, saved: Checkpoint): TurnResult {
  logger.error("Session store failed", error, { userId, stage: saved.stage });
  return {
    stage: saved.stage,
    response: errorReply(error.message, error.retryable),
    transitions: saved.transitions,
    executionId: saved.executionId,
    error: toSessionError(error),
  };
}

function toSessionError(error: Error): SessionError {
  if (error instanceof GrowthCoachError) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  return { code: "STAGE_FAILED", message: error.message, retryable: true };
}
