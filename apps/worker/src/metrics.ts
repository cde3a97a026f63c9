import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

// Dedicated registry so repeated imports (tests, multiple entrypoints) never
// collide on the global default registry.
export const register = new Registry();

collectDefaultMetrics({
  register,
  prefix: "worker_",
  gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
});

// ============================================
// Invocation Metrics
// ============================================

/**
 * Counter: Terminal path taken by each queue message
 * Labels: path (deferred/force_stopped/succeeded/throttled/failed/fault_retry/fault_dead_letter/undecodable)
 */
export const invocationsTotal = new Counter({
  name: "notify_invocations_total",
  help: "Queue messages processed, by terminal path",
  labelNames: ["path"] as const,
  registers: [register],
});

/**
 * Histogram: Time spent in a single send call (all attempts)
 * Labels: outcome (succeeded/throttled/failed)
 */
export const sendDuration = new Histogram({
  name: "notify_send_duration_seconds",
  help: "Duration of send calls including in-call retries",
  labelNames: ["outcome"] as const,
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

/**
 * Counter: Throttle (429) responses received from the channel
 * Labels: phase (create_conversation/send)
 */
export const throttleResponsesTotal = new Counter({
  name: "notify_throttle_responses_total",
  help: "Rate-limit responses received from the target channel",
  labelNames: ["phase"] as const,
  registers: [register],
});

// ============================================
// Queue Metrics
// ============================================

/**
 * Counter: Messages moved by background queue services
 * Labels: action (relayed/dead_lettered)
 */
export const queueMovesTotal = new Counter({
  name: "notify_queue_moves_total",
  help: "Messages relayed from the delay subject or moved to dead-letter",
  labelNames: ["action"] as const,
  registers: [register],
});
