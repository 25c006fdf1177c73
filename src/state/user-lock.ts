/**
 * Per-user advisory lock.
 *
 * Turns for one user run one at a time: an in-process promise chain orders
 * them locally, and with `distributed` enabled a store lock keyed by user
 * also excludes other processes sharing the store.
 */

import { SessionBusyError, normalizeError } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import type { KvStore } from "./kv-store.js";

const logger = createLogger("state.user-lock");

const DEFAULT_RETRY_INTERVAL_MS = 100;

export interface UserLockOptions {
  store: KvStore;
  distributed: boolean;
  lockTtlMs: number;
  waitTimeoutMs: number;
  retryIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function lockKey(userId: string): string {
  return `lock:session:${userId}`;
}

export class UserLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: UserLockOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async runExclusive<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(userId) ?? Promise.resolve();
    let releaseLocal: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseLocal = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(userId, tail);

    await previous;

    let token: string | null = null;
    try {
      if (this.options.distributed) {
        token = await this.acquireDistributed(userId);
      }
      return await fn();
    } finally {
      if (token !== null) {
        try {
          await this.options.store.releaseLock(lockKey(userId), token);
        } catch (error) {
          // The store lock lapses at its TTL; the local chain must still move on.
          logger.warn("Failed to release session lock", { userId, error: normalizeError(error).message });
        }
      }
      releaseLocal();
      if (this.tails.get(userId) === tail) {
        this.tails.delete(userId);
      }
    }
  }

  isLocked(userId: string): boolean {
    return this.tails.has(userId);
  }

  private async acquireDistributed(userId: string): Promise<string> {
    const startedAt = this.now();
    const retryInterval = this.options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;

    while (true) {
      const token = await this.options.store.acquireLock(lockKey(userId), this.options.lockTtlMs);
      if (token !== null) {
        return token;
      }

      const waited = this.now() - startedAt;
      if (waited >= this.options.waitTimeoutMs) {
        logger.warn("Gave up waiting for session lock", { userId, waitedMs: waited });
        throw new SessionBusyError(userId, waited);
      }

      await this.sleep(retryInterval);
    }
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
