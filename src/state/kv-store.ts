/**
 * Key-value store contract shared by the Redis store and its local
 * SQLite-file substitute. Values are strings; JSON helpers sit on top.
 */

export interface KvStore {
  readonly kind: "redis" | "sqlite";
  get(key: string): Promise<string | null>;
  /** Overwrites. A missing ttl keeps the entry until it is replaced or deleted. */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Returns an owner token when the lock was free, null when it is held. */
  acquireLock(key: string, ttlMs: number): Promise<string | null>;
  /** Releases only when `token` still owns the lock. */
  releaseLock(key: string, token: string): Promise<void>;
  close(): Promise<void>;
}

export async function getJson<T>(
  store: KvStore,
  key: string,
  parse: (value: unknown) => T,
): Promise<T | null> {
  const raw = await store.get(key);
  if (raw === null) {
    return null;
  }
  return parse(JSON.parse(raw));
}

export async function setJson(
  store: KvStore,
  key: string,
  value: unknown,
  ttlSeconds?: number,
): Promise<void> {
  await store.set(key, JSON.stringify(value), ttlSeconds);
}
