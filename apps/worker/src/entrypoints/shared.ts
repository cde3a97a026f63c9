/**
 * Shared initialization logic for service entrypoints.
 */

import { fastify, type FastifyInstance } from "fastify";
import { config } from "../config.js";
import { log, toError } from "../logger.js";
import { register } from "../metrics.js";
import { NatsClient } from "../nats/client.js";
import { NatsQueueService } from "../nats/queue-service.js";

export { config, log };

// Shared NATS setup
export async function initNats(): Promise<{ natsClient: NatsClient; queueService: NatsQueueService }> {
  const natsClient = new NatsClient();
  await natsClient.connect();

  const queueService = new NatsQueueService(natsClient);

  log.system.info({ cluster: config.NATS_CLUSTER }, "NATS connected");
  return { natsClient, queueService };
}

export type HealthChecks = Record<string, () => Promise<boolean>>;

/**
 * Minimal HTTP server for liveness, component health and Prometheus scraping.
 */
export function createHealthServer(serviceName: string, checks: HealthChecks): FastifyInstance {
  const app = fastify({ logger: false });

  app.get("/health", async () => {
    return { status: "ok", service: serviceName, timestamp: new Date().toISOString() };
  });

  app.get("/health/detailed", async () => {
    const components: Record<string, "ok" | "error"> = {};
    for (const [name, check] of Object.entries(checks)) {
      components[name] = (await check()) ? "ok" : "error";
    }
    const healthy = Object.values(components).every((status) => status === "ok");

    return {
      status: healthy ? "ok" : "degraded",
      service: serviceName,
      components,
      timestamp: new Date().toISOString(),
    };
  });

  app.get("/metrics", async (_, reply) => {
    reply.header("Content-Type", register.contentType);
    return register.metrics();
  });

  return app;
}

// Graceful shutdown helper
const SHUTDOWN_TIMEOUT_MS = 30000;

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  name: string
): Promise<T | void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn({ error: toError(error).message, component: name }, "shutdown timeout");
  } finally {
    clearTimeout(timer);
  }
}

export function createShutdownHandler(
  serviceName: string,
  shutdownFn: () => Promise<void>
): void {
  let shutdownInProgress = false;

  async function initiateShutdown(): Promise<void> {
    if (shutdownInProgress) {
      log.system.warn({ service: serviceName }, "shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;

    log.system.info({ service: serviceName }, "shutting down");

    const forceExitTimer = setTimeout(() => {
      log.system.error({ service: serviceName }, "shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await shutdownFn();
      log.system.info({ service: serviceName }, "shutdown complete");
      process.exit(0);
    } catch (error) {
      log.system.error({ service: serviceName, error: toError(error).message }, "shutdown error");
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void initiateShutdown());
  process.on("SIGINT", () => void initiateShutdown());
}

// Service banner for dev
export function printBanner(serviceName: string, extras: Record<string, string | number | boolean> = {}): void {
  if (config.NODE_ENV !== "production") {
    const lines = [
      `  ${serviceName}`,
      `  Port: ${config.PORT}`,
      ...Object.entries(extras).map(([k, v]) => `  ${k}: ${v}`),
    ];

    console.log(`
========================================
${lines.join("\n")}
========================================
`);
  }
}
