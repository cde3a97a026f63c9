import { z } from "zod";
import { callWithThrottleRetries } from "../channel/throttled-call.js";
import type { ChannelClient } from "../channel/channel-client.js";
import { TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import type { ResolvedSendParams, SendJob, SendParams } from "../types/jobs.js";
import type { DelayRequeuer } from "./delay-requeuer.js";
import type { NotificationContentSource } from "./notification-content.js";
import type { ResultRecorder } from "./result-recorder.js";
import { throttleResponsesTotal } from "../metrics.js";
import { log } from "../logger.js";

export type ParamsResolution =
  | {
      /** The resolver already recorded or requeued the job; nothing more to do */
      forceStop: true;
    }
  | {
      forceStop: false;
      /** Rate-limit responses received while resolving */
      throttleCount: number;
      params: SendParams;
      recipientId: string;
    };

/**
 * Turns a job into send parameters (content + destination).
 *
 * When establishing the destination is itself rate-limited or fails, the
 * resolver handles the requeue/record on its own and returns forceStop.
 */
export interface ParamsResolver {
  resolveParams(job: SendJob): Promise<ParamsResolution>;
}

export interface ConversationParamsResolverDeps {
  contentSource: NotificationContentSource;
  channel: ChannelClient;
  delayRequeuer: DelayRequeuer;
  resultRecorder: ResultRecorder;
}

export interface ConversationParamsResolverOptions {
  maxNumberOfAttempts: number;
  sendRetryDelaySeconds: number;
  delayProvider?: DelayProvider;
}

const createConversationResponseSchema = z.object({
  id: z.string().min(1),
});

/**
 * Existing conversation for the job: previously resolved params win over the
 * conversation captured with the recipient.
 */
export function findExistingConversation(job: SendJob): ResolvedSendParams | null {
  if (job.resolvedParams) {
    return job.resolvedParams;
  }
  if (job.recipientData.conversationId) {
    return {
      serviceUrl: job.recipientData.serviceUrl,
      conversationId: job.recipientData.conversationId,
    };
  }
  return null;
}

export class ConversationParamsResolver implements ParamsResolver {
  private delayProvider: DelayProvider;

  constructor(
    private deps: ConversationParamsResolverDeps,
    private options: ConversationParamsResolverOptions
  ) {
    this.delayProvider = options.delayProvider ?? new TimeoutDelayProvider();
  }

  async resolveParams(job: SendJob): Promise<ParamsResolution> {
    const { notificationId, recipientId, recipientData } = job;

    const content = await this.deps.contentSource.getContent(notificationId);
    if (content === null) {
      throw new Error(`Notification ${notificationId} not found`);
    }

    const existing = findExistingConversation(job);
    if (existing) {
      return { forceStop: false, throttleCount: 0, params: { ...existing, content }, recipientId };
    }

    if (recipientData.recipientType === "channel") {
      throw new Error(`Channel recipient ${recipientId} has no conversation id`);
    }
    const userId = recipientData.userId;
    if (!userId) {
      throw new Error(`Recipient ${recipientId} has neither a conversation id nor a user id`);
    }

    const result = await callWithThrottleRetries(
      () =>
        this.deps.channel.createConversation({
          serviceUrl: recipientData.serviceUrl,
          userId,
          tenantId: recipientData.tenantId,
        }),
      {
        maxAttempts: this.options.maxNumberOfAttempts,
        delayProvider: this.delayProvider,
        onThrottle: () => throttleResponsesTotal.inc({ phase: "create_conversation" }),
      }
    );

    const outcome = result.outcome;
    switch (outcome.type) {
      case "succeeded": {
        const parsed = createConversationResponseSchema.safeParse(result.response?.body);
        if (!parsed.success) {
          throw new Error(`Create conversation for ${recipientId} returned no conversation id`);
        }

        log.sender.debug({ notificationId, recipientId, throttles: result.throttleCount }, "conversation created");
        return {
          forceStop: false,
          throttleCount: result.throttleCount,
          params: { serviceUrl: recipientData.serviceUrl, conversationId: parsed.data.id, content },
          recipientId,
        };
      }

      case "throttled":
        log.sender.warn(
          { notificationId, recipientId, attempts: this.options.maxNumberOfAttempts },
          "create conversation throttled"
        );
        await this.deps.delayRequeuer.delayAndRequeue(job, this.options.sendRetryDelaySeconds);
        return { forceStop: true };

      case "failed":
        log.sender.error(
          { notificationId, recipientId, statusCode: outcome.statusCode, error: outcome.errorMessage },
          "create conversation failed"
        );
        await this.deps.resultRecorder.record({
          notificationId,
          recipientId,
          totalThrottleCount: result.throttleCount,
          fromParameterResolution: true,
          statusCode: outcome.statusCode,
          errorMessage: outcome.errorMessage,
        });
        return { forceStop: true };
    }
  }
}
