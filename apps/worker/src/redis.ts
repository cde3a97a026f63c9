import { Redis } from "ioredis";
import { config } from "./config.js";
import { log } from "./logger.js";

/**
 * Dragonfly (Redis-compatible) connection shared by the worker.
 *
 * Uses a simple connection - the Dragonfly Operator handles HA/failover
 * behind the service endpoint.
 */
export function createRedisClient(url: string = config.DRAGONFLY_URL): Redis {
  const [host, portStr] = url.split(":");
  const port = parseInt(portStr || "6379", 10);

  const redis = new Redis({
    host: host || "localhost",
    port,
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 50, 2000),
    lazyConnect: true,
  });

  redis.on("error", (error) => {
    log.throttle.error({ error: error.message }, "Dragonfly connection error");
  });

  redis.on("connect", () => {
    log.throttle.debug({}, "Dragonfly connected");
  });

  return redis;
}

export async function redisHealthCheck(redis: Redis): Promise<boolean> {
  try {
    return (await redis.ping()) === "PONG";
  } catch (error) {
    log.throttle.error({ error: error instanceof Error ? error.message : String(error) }, "Dragonfly health check failed");
    return false;
  }
}
