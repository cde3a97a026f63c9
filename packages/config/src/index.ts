import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  WORKER_ID: z.string().default("worker-1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // ===========================================================================
  // Database (PostgreSQL)
  // ===========================================================================
  DATABASE_URL: z.string().url(),
  DATABASE_POOL_MAX: z.coerce.number().min(1).default(20),

  // ===========================================================================
  // NATS JetStream
  // ===========================================================================
  NATS_CLUSTER: z.string().default("nats://localhost:4222"),
  NATS_REPLICAS: z.coerce.number().min(1).max(5).default(3),
  NATS_TLS_ENABLED: stringBoolean.default(false),
  NATS_TLS_CA_FILE: z.string().optional(),
  NATS_TLS_CERT_FILE: z.string().optional(),
  NATS_TLS_KEY_FILE: z.string().optional(),

  // ===========================================================================
  // Dragonfly (Redis-compatible, holds the global throttle deadline)
  // ===========================================================================
  DRAGONFLY_URL: z.string().default("localhost:6379"),

  // ===========================================================================
  // Sending
  // ===========================================================================
  /** Send tries per invocation before a result is declared throttled or failed */
  MAX_NUMBER_OF_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  /** Used for the global throttle deadline and for per-job requeue delay */
  SEND_RETRY_DELAY_SECONDS: z.coerce.number().positive().default(660),

  // ===========================================================================
  // Target channel (conversation API)
  // ===========================================================================
  CHANNEL_API_TOKEN: z.string().default(""),
  CHANNEL_REQUEST_TIMEOUT_MS: z.coerce.number().min(100).default(30000),

  // ===========================================================================
  // Worker
  // ===========================================================================
  PORT: z.coerce.number().default(6001),
  /** Host invocation deadline, enforced as the JetStream ack wait */
  INVOCATION_TIMEOUT_MS: z.coerce.number().min(1000).default(5 * 60 * 1000),
  MAX_CONCURRENT_MESSAGES: z.coerce.number().int().min(1).default(100),

  // ===========================================================================
  // Background Services
  // ===========================================================================
  DELAY_RELAY_ENABLED: stringBoolean.default(true),
  DEAD_LETTER_MONITOR_ENABLED: stringBoolean.default(true),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
