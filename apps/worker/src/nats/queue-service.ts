import { JetStreamClient, StringCodec, headers as natsHeaders, type MsgHdrs } from "nats";
import { encodeSendJob } from "../domain/job-codec.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import type { SendQueue } from "../queue/types.js";
import type { SendJob } from "../types/jobs.js";
import { NatsClient, STREAM_NAME, Subjects } from "./client.js";
import { log, getTraceId } from "../logger.js";

/** Epoch ms before which the delay relay holds a message */
export const NOT_BEFORE_HEADER = "X-Not-Before";
export const TRACE_ID_HEADER = "X-Trace-Id";
export const DEAD_LETTER_REASON_HEADER = "X-Dead-Letter-Reason";

export interface DeadLetterMessage {
  payload: Uint8Array;
  reason: string;
  /** Stream sequence of the exhausted message, used for deduplication */
  originalSeq: number;
  traceId?: string;
}

function traceHeaders(traceId: string | undefined = getTraceId()): MsgHdrs {
  const hdrs = natsHeaders();
  if (traceId) {
    hdrs.set(TRACE_ID_HEADER, traceId);
  }
  return hdrs;
}

export class NatsQueueService implements SendQueue {
  private js: JetStreamClient;
  private sc = StringCodec();

  constructor(
    natsClient: NatsClient,
    private time: TimeProvider = new SystemTimeProvider()
  ) {
    this.js = natsClient.getJetStream();
  }

  async enqueue(job: SendJob): Promise<void> {
    try {
      const ack = await this.js.publish(Subjects.send, this.sc.encode(encodeSendJob(job)), {
        msgID: `send-${job.notificationId}-${job.recipientId}`,
        headers: traceHeaders(),
        expect: { streamName: STREAM_NAME },
      });

      if (!ack.duplicate) {
        log.queue.debug(
          { notificationId: job.notificationId, recipientId: job.recipientId, seq: ack.seq },
          "job enqueued"
        );
      }
    } catch (error) {
      log.queue.error(
        { error, notificationId: job.notificationId, recipientId: job.recipientId },
        "failed to enqueue job"
      );
      throw error;
    }
  }

  /**
   * Park the job on the delayed subject. Every call is a new message: the
   * same job may legitimately be deferred many times.
   */
  async enqueueDelayed(job: SendJob, delaySeconds: number): Promise<void> {
    const notBefore = this.time.now() + Math.round(delaySeconds * 1000);
    const hdrs = traceHeaders();
    hdrs.set(NOT_BEFORE_HEADER, String(notBefore));

    try {
      const ack = await this.js.publish(Subjects.delayed, this.sc.encode(encodeSendJob(job)), {
        headers: hdrs,
        expect: { streamName: STREAM_NAME },
      });

      log.queue.debug(
        {
          notificationId: job.notificationId,
          recipientId: job.recipientId,
          delaySeconds,
          notBefore: new Date(notBefore).toISOString(),
          seq: ack.seq,
        },
        "job enqueued with delay"
      );
    } catch (error) {
      log.queue.error(
        { error, notificationId: job.notificationId, recipientId: job.recipientId, delaySeconds },
        "failed to enqueue delayed job"
      );
      throw error;
    }
  }

  /**
   * Move a message back onto the send subject once its delay has passed.
   * Keyed on the delayed message's id so a redelivered relay publishes once.
   */
  async relay(payload: string, delayedMessageId: string, traceId?: string): Promise<void> {
    const ack = await this.js.publish(Subjects.send, this.sc.encode(payload), {
      msgID: `relay-${delayedMessageId}`,
      headers: traceHeaders(traceId),
      expect: { streamName: STREAM_NAME },
    });

    log.queue.debug({ delayedMessageId, seq: ack.seq, duplicate: ack.duplicate }, "delayed job relayed");
  }

  async publishDeadLetter(message: DeadLetterMessage): Promise<void> {
    const hdrs = traceHeaders(message.traceId);
    hdrs.set(DEAD_LETTER_REASON_HEADER, message.reason);

    const ack = await this.js.publish(Subjects.deadLetter, message.payload, {
      msgID: `dead-letter-${message.originalSeq}`,
      headers: hdrs,
      expect: { streamName: STREAM_NAME },
    });

    log.queue.warn(
      { originalSeq: message.originalSeq, seq: ack.seq, reason: message.reason },
      "message dead-lettered"
    );
  }
}
