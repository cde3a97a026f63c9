import { pino, type LoggerOptions } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage propagates the traceId through the whole invocation
// without passing it to every collaborator.
//
// Usage:
//   await withTraceAsync(async () => {
//     log.orchestrator.info({ notificationId }, "processing"); // traceId added
//     await sender.send(params, maxAttempts);                  // nested logs too
//   }, msg.headers?.get("X-Trace-Id"));
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a short, unique trace ID (12 chars, base64url)
 */
export function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

/**
 * Get the current trace ID from context, or undefined if not in a trace
 */
export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Run an async function with a trace context. All logs within will include the traceId.
 * If no traceId is provided, a new one is generated.
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.orchestrator.info({ notificationId, recipientId, statusCode }, "sent")
//
// FAILURE (detailed, error level):
//   log.orchestrator.error({ notificationId, recipientId, error: err.message, deliveryAttemptCount }, "fault")
//
// =============================================================================

function resolveLevel(): string {
  if (config.LOG_LEVEL) return config.LOG_LEVEL;
  if (config.NODE_ENV === "test") return "silent";
  return isDev ? "debug" : "info";
}

const baseConfig: LoggerOptions = {
  level: resolveLevel(),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

// Pretty printing only in development
export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Per-message send orchestration
  orchestrator: logger.child({ component: "orchestrator" }),

  // Global throttle state and admission
  throttle: logger.child({ component: "throttle" }),

  // Conversation resolution and channel sends
  sender: logger.child({ component: "sender" }),

  // Queue operations (enqueue, delay, dead-letter)
  queue: logger.child({ component: "queue" }),

  // NATS connection and consumers
  nats: logger.child({ component: "nats" }),

  // Database operations
  db: logger.child({ component: "db" }),

  // System-level events
  system: logger.child({ component: "system" }),
};

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
