/**
 * Configuration and stats routes
 * Allows runtime configuration changes for testing
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getConfig, updateConfig, resetConfig } from "../config.js";
import { store } from "../store.js";

const configSchema = z.object({
  throttleRate: z.number().min(0).max(1).optional(),
  notFoundRate: z.number().min(0).max(1).optional(),
  failureRate: z.number().min(0).max(1).optional(),
  retryAfterSeconds: z.number().int().min(0).max(3600).optional(),
  enabled: z.boolean().optional(),
});

export async function registerConfigRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /config - Get current configuration
   */
  app.get("/config", async (_request, reply) => {
    return reply.send(getConfig());
  });

  /**
   * POST /config - Update configuration
   */
  app.post("/config", async (request, reply) => {
    const result = configSchema.safeParse(request.body);
    if (!result.success) {
      return reply.status(400).send({
        error: "Invalid configuration",
        details: result.error.format(),
      });
    }

    const updated = updateConfig(result.data);
    request.log.info({ config: result.data }, "config updated");

    return reply.send(updated);
  });

  /**
   * POST /reset - Reset everything (config + stored conversations)
   */
  app.post("/reset", async (request, reply) => {
    store.reset();
    resetConfig();
    request.log.info("store and config reset");

    return reply.send({
      success: true,
      message: "Store and config reset",
    });
  });

  /**
   * GET /stats - Get store statistics
   */
  app.get("/stats", async (_request, reply) => {
    return reply.send(store.getStats());
  });

  /**
   * GET /health - Health check
   */
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      timestamp: new Date().toISOString(),
      stats: store.getStats(),
    });
  });
}
