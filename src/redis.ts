import Redis from "ioredis";
import type { KeyValueStore, StoreWrite } from "./lib/kv";
import { errorMessage, logger } from "./lib/logger";

export function createRedis(url: string): Redis {
  const redis = new Redis(url, { maxRetriesPerRequest: 3 });
  redis.on("error", (err: unknown) => {
    logger.error("Redis connection error", { event: "redis_error", error: errorMessage(err) });
  });
  return redis;
}

export class RedisStore implements KeyValueStore {
  constructor(private readonly redis: Redis) {}

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
  }

  incrBy(key: string, delta: number): Promise<number> {
    return this.redis.incrby(key, delta);
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async transaction(writes: StoreWrite[]): Promise<void> {
    const tx = this.redis.multi();
    for (const write of writes) {
      if (write.op === "set") tx.set(write.key, write.value);
      else if (write.op === "incrBy") tx.incrby(write.key, write.delta);
      else tx.del(write.key);
    }
    const results = await tx.exec();
    if (!results) throw new Error("Redis transaction was discarded");
    for (const [err] of results) {
      if (err) throw err;
    }
  }

  async sAdd(key: string, member: string): Promise<void> {
    await this.redis.sadd(key, member);
  }

  sMembers(key: string): Promise<string[]> {
    return this.redis.smembers(key);
  }

  async lPush(key: string, value: string, maxLen: number): Promise<void> {
    await this.redis
      .multi()
      .lpush(key, value)
      .ltrim(key, 0, maxLen - 1)
      .exec();
  }

  lRange(key: string, count: number): Promise<string[]> {
    return this.redis.lrange(key, 0, count - 1);
  }
}
