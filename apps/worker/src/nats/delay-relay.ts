import { runConsumerLoop } from "../queue/consumer-loop.js";
import type { MessageSource, QueueMessage } from "../queue/types.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { NOT_BEFORE_HEADER } from "./queue-service.js";
import { queueMovesTotal } from "../metrics.js";
import { log } from "../logger.js";

/** Longest single hold; the server redelivers and the relay re-checks */
export const MAX_HOLD_MS = 5 * 60 * 1000;

export interface RelayTarget {
  relay(payload: string, delayedMessageId: string, traceId?: string): Promise<void>;
}

export type RelayAction = { kind: "hold"; waitMs: number } | { kind: "release" };

/**
 * A message with no readable deadline is released immediately.
 *
 * @example
 * decideRelay("5000", 1000) // { kind: "hold", waitMs: 4000 }
 * decideRelay("5000", 5000) // { kind: "release" }
 */
export function decideRelay(notBeforeHeader: string | undefined, nowMs: number): RelayAction {
  const notBefore = notBeforeHeader ? Number(notBeforeHeader) : NaN;
  if (Number.isNaN(notBefore) || notBefore <= nowMs) {
    return { kind: "release" };
  }
  return { kind: "hold", waitMs: Math.min(notBefore - nowMs, MAX_HOLD_MS) };
}

/**
 * Holds messages on the delayed subject until their X-Not-Before deadline,
 * then republishes them to the send subject as fresh messages. A deferral
 * therefore never spends a delivery attempt of the send consumer.
 */
export class DelayRelay {
  private isShuttingDown = false;
  private running: Promise<void> | null = null;

  constructor(
    private source: MessageSource & { stop(): void },
    private target: RelayTarget,
    private time: TimeProvider = new SystemTimeProvider()
  ) {}

  async handleMessage(message: QueueMessage): Promise<void> {
    const action = decideRelay(message.header(NOT_BEFORE_HEADER), this.time.now());

    if (action.kind === "hold") {
      message.nack(action.waitMs);
      return;
    }

    await this.target.relay(message.payload, message.metadata.messageId, message.traceId);
    message.ack();
    queueMovesTotal.inc({ action: "relayed" });
  }

  start(maxInFlight: number): Promise<void> {
    if (!this.running) {
      this.running = runConsumerLoop(this.source, (message) => this.handleMessage(message), {
        maxInFlight,
        isShuttingDown: () => this.isShuttingDown,
      });
      log.system.info({ consumer: this.source.name }, "delay relay started");
    }
    return this.running;
  }

  async stop(): Promise<void> {
    this.isShuttingDown = true;
    this.source.stop();
    await this.running;
    log.system.info({ consumer: this.source.name }, "delay relay stopped");
  }
}
