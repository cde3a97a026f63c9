import type { ConsumerMessages } from "nats";
import type { MessageSource, QueueMessage } from "../queue/types.js";
import { NatsClient, STREAM_NAME } from "./client.js";
import { TRACE_ID_HEADER } from "./queue-service.js";
import { log } from "../logger.js";

/**
 * The parts of a JetStream message the worker reads. JsMsg satisfies it.
 */
export interface JetStreamDelivery {
  data: Uint8Array;
  seq: number;
  headers?: { get(key: string): string };
  info: {
    /** Deliveries so far, including this one (1 on first delivery) */
    redeliveryCount: number;
    timestampNanos: number;
  };
  ack(): void;
  nak(millis?: number): void;
}

const decoder = new TextDecoder();

export function toQueueMessage(msg: JetStreamDelivery): QueueMessage {
  // MsgHdrs.get returns "" for a missing header
  const messageId = msg.headers?.get("Nats-Msg-Id") || String(msg.seq);
  const traceId = msg.headers?.get(TRACE_ID_HEADER) || undefined;

  return {
    payload: decoder.decode(msg.data),
    metadata: {
      deliveryAttemptCount: msg.info.redeliveryCount,
      enqueuedAtUtc: new Date(Math.floor(msg.info.timestampNanos / 1_000_000)),
      messageId,
    },
    traceId,
    header: (name: string) => msg.headers?.get(name) || undefined,
    ack: () => msg.ack(),
    nack: (delayMs?: number) => msg.nak(delayMs),
  };
}

/**
 * Pull-consumer backed message source. stop() ends the iteration; messages
 * already pulled but not yet handed out are redelivered by the server.
 */
export class NatsMessageSource implements MessageSource {
  private messages: ConsumerMessages | null = null;
  private stopped = false;

  constructor(
    private natsClient: NatsClient,
    readonly name: string,
    private maxMessages: number
  ) {}

  async *receive(): AsyncIterable<QueueMessage> {
    const consumer = await this.natsClient.getJetStream().consumers.get(STREAM_NAME, this.name);
    const messages = await consumer.consume({ max_messages: this.maxMessages });
    this.messages = messages;

    if (this.stopped) {
      messages.stop();
    }

    log.nats.info({ consumer: this.name, maxMessages: this.maxMessages }, "consuming");

    for await (const msg of messages) {
      yield toQueueMessage(msg);
    }
  }

  stop(): void {
    this.stopped = true;
    this.messages?.stop();
  }
}
