/**
 * Redis Key-Value Store
 *
 * Primary store for research cache, sessions, dispatch records and the
 * per-user advisory locks.
 */

import type { Redis } from "ioredis";
import { ulid } from "ulid";
import type { KvStore } from "./kv-store.js";

/** Deletes the lock only if the caller's token still owns it. */
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export type RedisCommandClient = Pick<Redis, "get" | "set" | "del" | "eval" | "quit">;

export class RedisKvStore implements KvStore {
  readonly kind = "redis" as const;

  constructor(
    private readonly client: RedisCommandClient,
    private readonly keyPrefix = "growth-coach:",
  ) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(this.prefixed(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined && ttlSeconds > 0) {
      await this.client.set(this.prefixed(key), value, "EX", Math.ceil(ttlSeconds));
      return;
    }
    await this.client.set(this.prefixed(key), value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.prefixed(key));
  }

  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    const token = ulid();
    const result = await this.client.set(this.prefixed(key), token, "PX", Math.ceil(ttlMs), "NX");
    return result === "OK" ? token : null;
  }

  async releaseLock(key: string, token: string): Promise<void> {
    await this.client.eval(RELEASE_LOCK_SCRIPT, 1, this.prefixed(key), token);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
