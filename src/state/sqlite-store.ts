/**
 * SQLite Key-Value Store
 *
 * File-backed substitute for the Redis store, used when no Redis is
 * configured or reachable, and as the dispatcher's local fallback.
 * Expired rows are treated as absent and removed lazily.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import { ulid } from "ulid";
import { CREATE_TABLES, SCHEMA_VERSION } from "./schema.js";
import type { KvStore } from "./kv-store.js";

type Db = BetterSqlite3.Database;

interface KvRow {
  value: string;
  expires_at: number | null;
}

interface LockRow {
  token: string;
  expires_at: number;
}

export class SqliteKvStore implements KvStore {
  readonly kind = "sqlite" as const;
  private readonly now: () => number;

  constructor(private readonly db: Db, options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
    db.exec(CREATE_TABLES);
    db.prepare("INSERT OR IGNORE INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
  }

  static open(filePath: string, options: { now?: () => number } = {}): SqliteKvStore {
    if (filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    const db = new Database(filePath);
    if (filePath !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    return new SqliteKvStore(db, options);
  }

  async get(key: string): Promise<string | null> {
    const row = this.db
      .prepare("SELECT value, expires_at FROM kv WHERE key = ?")
      .get(key) as KvRow | undefined;

    if (!row) {
      return null;
    }

    if (row.expires_at !== null && row.expires_at <= this.now()) {
      this.db.prepare("DELETE FROM kv WHERE key = ? AND expires_at = ?").run(key, row.expires_at);
      return null;
    }

    return row.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds !== undefined && ttlSeconds > 0
      ? this.now() + ttlSeconds * 1000
      : null;

    this.db.prepare(
      "INSERT OR REPLACE INTO kv (key, value, expires_at, updated_at) VALUES (?, ?, ?, datetime('now'))",
    ).run(key, value, expiresAt);
  }

  async delete(key: string): Promise<void> {
    this.db.prepare("DELETE FROM kv WHERE key = ?").run(key);
  }

  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    const token = ulid();
    const now = this.now();

    const tryAcquire = this.db.transaction((): boolean => {
      const existing = this.db
        .prepare("SELECT token, expires_at FROM locks WHERE key = ?")
        .get(key) as LockRow | undefined;

      if (existing && existing.expires_at > now) {
        return false;
      }

      this.db.prepare(
        "INSERT OR REPLACE INTO locks (key, token, expires_at) VALUES (?, ?, ?)",
      ).run(key, token, now + ttlMs);
      return true;
    });

    return tryAcquire.immediate() ? token : null;
  }

  async releaseLock(key: string, token: string): Promise<void> {
    this.db.prepare("DELETE FROM locks WHERE key = ? AND token = ?").run(key, token);
  }

  /** Drops expired cache rows and locks; returns how many rows went. */
  purgeExpired(): number {
    const now = this.now();
    const kv = this.db.prepare("DELETE FROM kv WHERE expires_at IS NOT NULL AND expires_at <= ?").run(now);
    const locks = this.db.prepare("DELETE FROM locks WHERE expires_at <= ?").run(now);
    return kv.changes + locks.changes;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
