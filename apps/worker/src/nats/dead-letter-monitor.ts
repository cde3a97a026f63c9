import { z } from "zod";
import type { JetStreamManager, Subscription } from "nats";
import { NatsClient, MAX_DELIVERIES_ADVISORY, STREAM_NAME } from "./client.js";
import { TRACE_ID_HEADER, type DeadLetterMessage } from "./queue-service.js";
import { queueMovesTotal } from "../metrics.js";
import { log, toError } from "../logger.js";

const maxDeliveriesAdvisorySchema = z.object({
  stream: z.string(),
  consumer: z.string(),
  stream_seq: z.number().int().positive(),
  deliveries: z.number().int(),
});

export type MaxDeliveriesAdvisory = z.infer<typeof maxDeliveriesAdvisorySchema>;

export interface ExhaustedMessage {
  data: Uint8Array;
  traceId?: string;
}

/**
 * Access to messages still held by the work-queue stream, by sequence.
 */
export interface StreamMessageStore {
  /** null when the message is no longer in the stream */
  get(seq: number): Promise<ExhaustedMessage | null>;
  remove(seq: number): Promise<void>;
}

export interface DeadLetterPublisher {
  publishDeadLetter(message: DeadLetterMessage): Promise<void>;
}

export class JetStreamMessageStore implements StreamMessageStore {
  constructor(private jsm: JetStreamManager) {}

  async get(seq: number): Promise<ExhaustedMessage | null> {
    try {
      const stored = await this.jsm.streams.getMessage(STREAM_NAME, { seq });
      return {
        data: stored.data,
        traceId: stored.header.get(TRACE_ID_HEADER) || undefined,
      };
    } catch (error) {
      log.queue.warn({ seq, error: toError(error).message }, "exhausted message not found in stream");
      return null;
    }
  }

  async remove(seq: number): Promise<void> {
    await this.jsm.streams.deleteMessage(STREAM_NAME, seq);
  }
}

/**
 * Moves send-worker messages that ran out of deliveries to the dead-letter
 * subject. The server leaves such messages in the work queue and only
 * announces them through an advisory; the monitor copies, then deletes.
 *
 * Workers share a queue group, so each advisory is handled by one of them.
 */
export class DeadLetterMonitor {
  private subscription: Subscription | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private store: StreamMessageStore,
    private publisher: DeadLetterPublisher
  ) {}

  async handleAdvisory(raw: string): Promise<void> {
    let advisory: MaxDeliveriesAdvisory;
    try {
      advisory = maxDeliveriesAdvisorySchema.parse(JSON.parse(raw));
    } catch (error) {
      log.queue.error({ error: toError(error).message }, "unreadable max-deliveries advisory");
      return;
    }

    const seq = advisory.stream_seq;
    const message = await this.store.get(seq);
    if (!message) {
      return;
    }

    await this.publisher.publishDeadLetter({
      payload: message.data,
      reason: `exhausted ${advisory.deliveries} deliveries on ${advisory.consumer}`,
      originalSeq: seq,
      traceId: message.traceId,
    });
    await this.store.remove(seq);

    queueMovesTotal.inc({ action: "dead_lettered" });
  }

  start(natsClient: NatsClient): Promise<void> {
    if (!this.running) {
      const subscription = natsClient.getConnection().subscribe(MAX_DELIVERIES_ADVISORY, {
        queue: "dead-letter-monitor",
      });
      this.subscription = subscription;

      this.running = (async () => {
        for await (const msg of subscription) {
          try {
            await this.handleAdvisory(msg.string());
          } catch (error) {
            // Left in the work queue for an operator to inspect
            log.queue.error({ error: toError(error).message }, "failed to dead-letter message");
          }
        }
      })();

      log.system.info({ subject: MAX_DELIVERIES_ADVISORY }, "dead-letter monitor started");
    }
    return this.running;
  }

  async stop(): Promise<void> {
    this.subscription?.unsubscribe();
    await this.running;
    log.system.info({}, "dead-letter monitor stopped");
  }
}
