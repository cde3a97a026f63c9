/**
 * Mock Channel Server
 *
 * Mimics the conversation API the worker delivers notifications through,
 * including configurable rate limiting. For local development and testing only.
 *
 * Endpoints:
 *   POST /v3/conversations                     - Create conversation (returns id)
 *   POST /v3/conversations/:id/activities      - Post message
 *   GET  /v3/conversations/:id/activities      - List posted messages
 *   GET  /config                               - Get current config
 *   POST /config                               - Update config (rates, Retry-After)
 *   POST /reset                                - Reset store and config
 *   GET  /stats                                - Get statistics
 *   GET  /health                               - Health check
 */

import { buildServer } from "./server.js";
import { updateConfig } from "./config.js";

const PORT = parseInt(process.env.PORT || "3978");
const THROTTLE_RATE = parseFloat(process.env.THROTTLE_RATE || "0.05");
const NOT_FOUND_RATE = parseFloat(process.env.NOT_FOUND_RATE || "0.01");
const FAILURE_RATE = parseFloat(process.env.FAILURE_RATE || "0.01");
const RETRY_AFTER_SECONDS = parseInt(process.env.RETRY_AFTER_SECONDS || "1");

async function main(): Promise<void> {
  const isDev = process.env.NODE_ENV !== "production";

  const app = await buildServer(
    isDev
      ? {
          level: "info",
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : { level: "info" }
  );

  updateConfig({
    throttleRate: THROTTLE_RATE,
    notFoundRate: NOT_FOUND_RATE,
    failureRate: FAILURE_RATE,
    retryAfterSeconds: RETRY_AFTER_SECONDS,
  });

  const shutdown = async (): Promise<void> => {
    console.log("\n[SHUTDOWN] Stopping...");
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await app.listen({ port: PORT, host: "0.0.0.0" });

  console.log(`
========================================
  Mock Channel Server
========================================
  http://localhost:${PORT}

  Config:
    Throttle rate: ${(THROTTLE_RATE * 100).toFixed(0)}%
    Not-found rate: ${(NOT_FOUND_RATE * 100).toFixed(0)}%
    Failure rate: ${(FAILURE_RATE * 100).toFixed(0)}%
    Retry-After: ${RETRY_AFTER_SECONDS}s
========================================
`);
}

main().catch((err: unknown) => {
  console.error("Failed to start mock-channel server:", err);
  process.exit(1);
});
