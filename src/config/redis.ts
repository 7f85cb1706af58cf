/**
 * Redis client for BullMQ
 */

import { Redis, type RedisOptions } from "ioredis";
import { REDIS_URL } from "./env.js";

/**
 * queue: producer side; commands fail fast while Redis is unreachable.
 * worker: blocking consumer; BullMQ requires unlimited retries per request.
 */
export type RedisRole = "queue" | "worker";

const MAX_RETRY_DELAY_MS = 5000;

/**
 * Connection options for one role.
 * Reconnection never gives up; the delay grows to MAX_RETRY_DELAY_MS and stays there.
 */
export function redisOptions(url: string, role: RedisRole): RedisOptions {
  const redisUrl = new URL(url);

  return {
    host: redisUrl.hostname,
    port: parseInt(redisUrl.port || "6379", 10),
    password: redisUrl.password || undefined,
    username: redisUrl.username || undefined,
    tls: redisUrl.protocol === "rediss:" ? { rejectUnauthorized: true } : undefined,

    ...(role === "worker"
      ? { maxRetriesPerRequest: null }
      : { maxRetriesPerRequest: 1, enableOfflineQueue: false }),
    enableReadyCheck: false,

    connectTimeout: 30000,
    keepAlive: 30000,

    retryStrategy: (times: number) => {
      const delay = Math.min(times * 500, MAX_RETRY_DELAY_MS);
      console.log(`[Redis] Retry attempt ${times}, waiting ${delay}ms`);
      return delay;
    },

    reconnectOnError: (err) => err.message.includes("READONLY"),
  };
}

/**
 * Creates a Redis connection configured for BullMQ.
 * Queue and Worker each get their own connection; blocking worker
 * commands must not share a socket with queue writes.
 */
export function createRedisConnection(role: RedisRole, url: string = REDIS_URL): Redis {
  const redis = new Redis(redisOptions(url, role));

  redis.on("error", (err) => {
    console.error(`[Redis] ${role} connection error:`, err.message);
  });

  redis.on("ready", () => {
    console.log(`[Redis] ${role} connection ready`);
  });

  return redis;
}
