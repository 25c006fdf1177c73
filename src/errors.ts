/**
 * Typed failures. Every error the core raises carries a stable `code` and
 * whether the caller may simply retry the turn.
 */

import type { ConversationStage, SpecialistId } from "./types.js";

export abstract class GrowthCoachError extends Error {
  abstract readonly code: string;
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean) {
    super(message);
    this.name = new.target.name;
    this.retryable = retryable;
  }
}

export class ProviderError extends GrowthCoachError {
  readonly code = "PROVIDER_ERROR";
  readonly providerName: string;
  readonly timedOut: boolean;

  constructor(providerName: string, message: string, options: { timedOut?: boolean } = {}) {
    super(`Provider '${providerName}' failed: ${message}`, true);
    this.providerName = providerName;
    this.timedOut = options.timedOut ?? false;
  }
}

export class StrategyUnavailableError extends GrowthCoachError {
  readonly code = "SYNTHESIS_UNAVAILABLE";
  readonly failures: { specialist: SpecialistId; error: string }[];

  constructor(failures: { specialist: SpecialistId; error: string }[]) {
    super(
      failures.length > 0
        ? `No specialist produced a proposal (${failures.map((f) => `${f.specialist}: ${f.error}`).join("; ")})`
        : "No specialists are configured",
      true,
    );
    this.failures = failures;
  }
}

export class DispatchError extends GrowthCoachError {
  readonly code = "DISPATCH_ERROR";
  readonly transient: boolean;
  readonly status: number | undefined;

  constructor(message: string, options: { transient: boolean; status?: number }) {
    super(message, options.transient);
    this.transient = options.transient;
    this.status = options.status;
  }
}

export class InvalidTransitionError extends GrowthCoachError {
  readonly code = "INVALID_TRANSITION";
  readonly from: ConversationStage;
  readonly to: ConversationStage;

  constructor(from: ConversationStage, to: ConversationStage, reason: string) {
    super(`Cannot move from '${from}' to '${to}': ${reason}`, false);
    this.from = from;
    this.to = to;
  }
}

export class SessionNotFoundError extends GrowthCoachError {
  readonly code = "SESSION_NOT_FOUND";
  readonly userId: string;

  constructor(userId: string) {
    super(`No conversation session for user '${userId}'`, false);
    this.userId = userId;
  }
}

export class SessionBusyError extends GrowthCoachError {
  readonly code = "SESSION_BUSY";

  constructor(userId: string, waitedMs: number) {
    super(`Session for user '${userId}' is still locked after ${waitedMs}ms`, true);
  }
}

export class SessionStoreError extends GrowthCoachError {
  readonly code = "SESSION_STORE_UNAVAILABLE";

  constructor(message: string, retryable = true) {
    super(message, retryable);
  }
}

export class TurnCancelledError extends GrowthCoachError {
  readonly code = "TURN_CANCELLED";

  constructor(stage: ConversationStage) {
    super(`Turn cancelled during '${stage}'`, true);
  }
}

export type LlmErrorKind = "unauthorized" | "quota_exhausted" | "timeout" | "unavailable";

export class LlmError extends GrowthCoachError {
  readonly code = "LLM_ERROR";
  readonly kind: LlmErrorKind;
  readonly providerId: string | null;

  constructor(kind: LlmErrorKind, message: string, providerId: string | null = null) {
    super(message, kind !== "unauthorized");
    this.kind = kind;
    this.providerId = providerId;
  }
}

export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
