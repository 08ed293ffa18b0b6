import { Redis } from "ioredis";
import { errorMessage } from "../domain/errors.js";
import { log } from "../logger.js";
import type { CacheGateway, HealthCheckable } from "./types.js";

/**
 * Form cache on Redis / Dragonfly. Entries never expire; errors propagate to
 * the caller, which owns the retry policy.
 */
export class CacheService implements CacheGateway, HealthCheckable {
  private readonly redis: Redis;
  private isConnected = false;

  constructor(url: string) {
    this.redis = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => Math.min(times * 100, 2000),
      reconnectOnError: (err) => {
        // Only reconnect when a replica answered READONLY
        return err.message.includes("READONLY");
      },
    });

    this.redis.on("connect", () => {
      this.isConnected = true;
      log.cache.info({}, "cache connected");
    });

    this.redis.on("error", (error: Error) => {
      log.cache.error({ error: error.message }, "cache error");
      this.isConnected = false;
    });

    this.redis.on("close", () => {
      this.isConnected = false;
      log.cache.info({}, "cache disconnected");
    });
  }

  async write(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
    log.cache.debug({ key }, "cache entry written");
  }

  async read(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
    log.cache.debug({ key }, "cache entry deleted");
  }

  async healthCheck(): Promise<boolean> {
    if (!this.isConnected) return false;

    try {
      const result = await this.redis.ping();
      return result === "PONG";
    } catch (error) {
      log.cache.error({ error: errorMessage(error) }, "cache health check failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
    log.cache.info({}, "cache connection closed");
  }
}
