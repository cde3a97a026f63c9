import { callWithThrottleRetries } from "../channel/throttled-call.js";
import type { ChannelClient } from "../channel/channel-client.js";
import type { SendOutcome } from "../domain/outcome.js";
import { TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import type { SendParams } from "../types/jobs.js";
import { sendDuration, throttleResponsesTotal } from "../metrics.js";
import { log } from "../logger.js";

export interface SendResult {
  outcome: SendOutcome;
  /** Rate-limit responses received across all attempts */
  throttleCount: number;
}

/**
 * Delivers one notification, trying up to maxAttempts times.
 */
export interface Sender {
  send(params: SendParams, maxAttempts: number): Promise<SendResult>;
}

export class ChannelSender implements Sender {
  constructor(
    private channel: ChannelClient,
    private delayProvider: DelayProvider = new TimeoutDelayProvider()
  ) {}

  async send(params: SendParams, maxAttempts: number): Promise<SendResult> {
    const stopTimer = sendDuration.startTimer();

    const result = await callWithThrottleRetries(
      () =>
        this.channel.sendMessage({
          serviceUrl: params.serviceUrl,
          conversationId: params.conversationId,
          content: params.content,
        }),
      {
        maxAttempts,
        delayProvider: this.delayProvider,
        onThrottle: (attempt) => {
          throttleResponsesTotal.inc({ phase: "send" });
          log.sender.debug({ conversationId: params.conversationId, attempt }, "send throttled");
        },
      }
    );

    stopTimer({ outcome: result.outcome.type });
    return { outcome: result.outcome, throttleCount: result.throttleCount };
  }
}
