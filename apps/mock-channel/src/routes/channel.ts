/**
 * Mock conversation endpoints
 * Mimics the channel's create-conversation and post-activity API
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { store } from "../store.js";
import { getConfig, determineOutcome, type ChannelOutcome } from "../config.js";

const createConversationSchema = z.object({
  isGroup: z.boolean().optional(),
  members: z.array(z.object({ id: z.string().min(1) })).min(1),
  tenantId: z.string().optional(),
});

const activitySchema = z
  .object({
    type: z.literal("message"),
    text: z.string().optional(),
  })
  .passthrough();

const conversationParamsSchema = z.object({ conversationId: z.string() });

/**
 * Sends the error response for a rejected outcome. Returns false when the
 * request should be accepted.
 */
function rejectIfUnlucky(reply: FastifyReply, outcome: ChannelOutcome): boolean {
  if (outcome === "accepted") return false;

  store.countRejected(outcome);

  if (outcome === "throttled") {
    const { retryAfterSeconds } = getConfig();
    if (retryAfterSeconds > 0) {
      reply.header("Retry-After", String(retryAfterSeconds));
    }
    reply.status(429).send({ error: { code: "TooManyRequests", message: "Rate limit exceeded" } });
  } else if (outcome === "not_found") {
    reply.status(404).send({ error: { code: "NotFound", message: "User not found" } });
  } else {
    reply.status(500).send({ error: { code: "InternalError", message: "Simulated failure" } });
  }
  return true;
}

export async function registerChannelRoutes(app: FastifyInstance): Promise<void> {
  app.addHook("onRequest", async (request, reply) => {
    if (request.url.startsWith("/v3/") && !getConfig().enabled) {
      return reply.status(503).send({ error: { code: "ServiceUnavailable", message: "Mock channel is disabled" } });
    }
  });

  /**
   * POST /v3/conversations - Create (or return) a 1:1 conversation
   */
  app.post("/v3/conversations", async (request, reply) => {
    const result = createConversationSchema.safeParse(request.body);
    if (!result.success) {
      return reply.status(400).send({ error: { code: "BadRequest", message: result.error.message } });
    }

    if (rejectIfUnlucky(reply, determineOutcome())) return reply;

    const conversation = store.addConversation(result.data.members[0].id, result.data.tenantId);
    return reply.status(201).send({ id: conversation.id });
  });

  /**
   * POST /v3/conversations/:conversationId/activities - Post a message
   */
  app.post("/v3/conversations/:conversationId/activities", async (request, reply) => {
    const { conversationId } = conversationParamsSchema.parse(request.params);

    const result = activitySchema.safeParse(request.body);
    if (!result.success) {
      return reply.status(400).send({ error: { code: "BadRequest", message: result.error.message } });
    }

    if (!store.hasConversation(conversationId)) {
      store.countRejected("not_found");
      return reply.status(404).send({ error: { code: "ConversationNotFound", message: "Conversation not found" } });
    }

    if (rejectIfUnlucky(reply, determineOutcome())) return reply;

    const activity = store.addActivity(conversationId, result.data.text);
    return reply.status(201).send({ id: activity.id });
  });

  /**
   * GET /v3/conversations/:conversationId/activities - List posted messages
   */
  app.get("/v3/conversations/:conversationId/activities", async (request, reply) => {
    const { conversationId } = conversationParamsSchema.parse(request.params);
    const activities = store.getActivities(conversationId);
    return reply.send({
      count: activities.length,
      activities: activities.map((a) => ({
        id: a.id,
        text: a.text,
        createdAt: new Date(a.createdAt).toISOString(),
      })),
    });
  });
}
