/**
 * Session Store
 *
 * One ConversationSession per user under `session:<userId>`, overwritten on
 * every mutation. Loaded sessions are validated before use so a corrupt
 * record fails loudly instead of driving the state machine.
 */

import { SessionStoreError, normalizeError } from "../errors.js";
import {
  CONVERSATION_STAGES,
  type ConversationSession,
  type ConversationStage,
  type GoalContext,
  type SequenceStage,
} from "../types.js";
import type { KvStore } from "./kv-store.js";

export const MAX_HISTORY_TURNS = 20;

export function sessionKey(userId: string): string {
  return `session:${userId}`;
}

export function createEmptyContext(): GoalContext {
  return {
    constraints: [],
    platform: "instagram",
    targetAudience: [],
  };
}

export function createSession(userId: string, now = new Date()): ConversationSession {
  const timestamp = now.toISOString();
  return {
    userId,
    stage: "greeting",
    resumeStage: null,
    context: createEmptyContext(),
    researchResult: null,
    strategy: null,
    executionPlan: null,
    executionId: null,
    rejectedTasks: [],
    lastError: null,
    history: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export class SessionStore {
  constructor(private readonly store: KvStore) {}

  /** Throws SessionStoreError when the store is unreachable or the record is unreadable. */
  async load(userId: string): Promise<ConversationSession | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(sessionKey(userId));
    } catch (error) {
      throw new SessionStoreError(`Could not load session for user '${userId}': ${normalizeError(error).message}`);
    }
    if (raw === null) {
      return null;
    }
    try {
      return deserializeSession(raw);
    } catch (error) {
      throw new SessionStoreError(
        `Stored session for user '${userId}' is unreadable: ${normalizeError(error).message}`,
        false,
      );
    }
  }

  async save(session: ConversationSession): Promise<void> {
    const trimmed: ConversationSession = {
      ...session,
      history: session.history.slice(-MAX_HISTORY_TURNS),
    };
    try {
      await this.store.set(sessionKey(session.userId), serializeSession(trimmed));
    } catch (error) {
      throw new SessionStoreError(
        `Could not save session for user '${session.userId}': ${normalizeError(error).message}`,
      );
    }
  }

  async delete(userId: string): Promise<void> {
    try {
      await this.store.delete(sessionKey(userId));
    } catch (error) {
      throw new SessionStoreError(`Could not delete session for user '${userId}': ${normalizeError(error).message}`);
    }
  }
}

export function serializeSession(session: ConversationSession): string {
  return JSON.stringify(session);
}

export function deserializeSession(raw: string): ConversationSession {
  const parsed: unknown = JSON.parse(raw);
  if (!isObject(parsed)) {
    throw new Error("session record must be an object");
  }

  if (typeof parsed.userId !== "string" || parsed.userId.length === 0) {
    throw new Error("session record has no userId");
  }

  if (typeof parsed.stage !== "string" || !isConversationStage(parsed.stage)) {
    throw new Error(`session record has unknown stage: ${String(parsed.stage)}`);
  }

  if (!isObject(parsed.context)) {
    throw new Error("session record has no context");
  }

  // The record is written only by serializeSession; the checks above guard
  // against foreign or truncated writes, the remaining shape is trusted.
  const session = parsed as unknown as ConversationSession;
  return {
    ...session,
    resumeStage: session.resumeStage ?? null,
    context: { ...createEmptyContext(), ...session.context },
    rejectedTasks: session.rejectedTasks ?? [],
    history: session.history ?? [],
    lastError: session.lastError ?? null,
    executionId: session.executionId ?? null,
  };
}

export function isSequenceStage(value: string): value is SequenceStage {
  return (CONVERSATION_STAGES as readonly string[]).includes(value);
}

export function isConversationStage(value: string): value is ConversationStage {
  return value === "error" || isSequenceStage(value);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
