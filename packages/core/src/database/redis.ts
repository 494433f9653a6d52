import Redis from "ioredis";
import { getInstanceKey, getRedisUrl } from "./config";
import { StateStore } from "./stateStore";

/**
 * Factory: create a new Redis client from REDIS_URL env.
 * The caller owns the lifecycle (connect, quit).
 */
export function createRedisClient(url: string = getRedisUrl()): Redis {
  const useTls = url.startsWith("rediss://");

  return new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    ...(useTls ? { tls: { rejectUnauthorized: false } } : {}),
  });
}

const STATE_PREFIX = "rps:state:";
const STATE_HISTORY_PREFIX = "rps:state-history:";
const STATE_HISTORY_LIMIT = 50;

function stateKey(instance: string): string {
  return STATE_PREFIX + instance;
}

function historyKey(instance: string): string {
  return STATE_HISTORY_PREFIX + instance;
}

/**
 * Snapshot store backed by a single Redis string key per instance.
 * Every write also pushes onto a capped list so an operator can inspect or
 * roll back recent states by hand.
 */
export class RedisStateStore implements StateStore {
  constructor(
    private redis: Redis,
    private instance: string = getInstanceKey()
  ) {}

  async read(): Promise<string | null> {
    return this.redis.get(stateKey(this.instance));
  }

  async write(data: string): Promise<void> {
    const results = await this.redis
      .multi()
      .set(stateKey(this.instance), data)
      .lpush(historyKey(this.instance), data)
      .ltrim(historyKey(this.instance), 0, STATE_HISTORY_LIMIT - 1)
      .exec();

    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
      throw failed?.[0] ?? new Error("Redis transaction was aborted");
    }
  }

  /** Most recent snapshots, newest first. */
  async recent(limit = 10): Promise<string[]> {
    return this.redis.lrange(historyKey(this.instance), 0, limit - 1);
  }
}
