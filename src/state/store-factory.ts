import path from "node:path";
import { Redis } from "ioredis";
import { createLogger } from "../observability/logger.js";
import { normalizeError } from "../errors.js";
import type { GrowthCoachConfig } from "../config.js";
import type { KvStore } from "./kv-store.js";
import { RedisKvStore } from "./redis-store.js";
import { SqliteKvStore } from "./sqlite-store.js";

const logger = createLogger("state.store-factory");

export const LOCAL_STORE_FILENAME = "growth-coach.db";

export interface StoreSet {
  /** Store selected at startup: Redis when reachable, otherwise the local file. */
  primary: KvStore;
  /** Local file store for degraded writes; null when the primary already is one. */
  localFallback: KvStore | null;
}

/**
 * Chooses the store once. Redis is tried when a URL is configured; any
 * connection failure falls back to the SQLite file under the data dir.
 */
export async function createStores(config: GrowthCoachConfig["store"]): Promise<StoreSet> {
  const localPath = path.join(config.dataDir, LOCAL_STORE_FILENAME);

  if (!config.redisUrl) {
    logger.info("No Redis configured, using local file store", { path: localPath });
    return { primary: SqliteKvStore.open(localPath), localFallback: null };
  }

  const client = new Redis(config.redisUrl, {
    lazyConnect: true,
    connectTimeout: config.connectTimeoutMs,
    maxRetriesPerRequest: 1,
  });

  try {
    await client.connect();
    await client.ping();
    logger.info("Connected to Redis store");
    return {
      primary: new RedisKvStore(client),
      localFallback: SqliteKvStore.open(localPath),
    };
  } catch (error) {
    client.disconnect();
    logger.warn("Redis unreachable, falling back to local file store", {
      path: localPath,
      error: normalizeError(error).message,
    });
    return { primary: SqliteKvStore.open(localPath), localFallback: null };
  }
}
