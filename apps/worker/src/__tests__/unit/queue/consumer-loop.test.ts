import { describe, it, expect } from "vitest";
import { runConsumerLoop } from "../../../queue/consumer-loop.js";
import type { MessageSource, QueueMessage } from "../../../queue/types.js";
import { buildQueueMessage, type FakeQueueMessage } from "../../../../test/fakes.js";

class ArraySource implements MessageSource {
  readonly name = "test-consumer";

  constructor(private messages: QueueMessage[]) {}

  async *receive(): AsyncIterable<QueueMessage> {
    for (const message of this.messages) {
      yield message;
    }
  }
}

function messages(count: number): FakeQueueMessage[] {
  return Array.from({ length: count }, (_, i) => buildQueueMessage(`payload-${i}`, { metadata: { messageId: `msg-${i}` } }));
}

describe("runConsumerLoop", () => {
  it("should hand every message to the handler and wait for all of them", async () => {
    const batch = messages(5);
    const handled: string[] = [];

    await runConsumerLoop(
      new ArraySource(batch),
      async (message) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        handled.push(message.payload);
        message.ack();
      },
      { maxInFlight: 10, isShuttingDown: () => false }
    );

    expect(handled.sort()).toEqual(["payload-0", "payload-1", "payload-2", "payload-3", "payload-4"]);
    for (const message of batch) {
      expect(message.ack).toHaveBeenCalledOnce();
    }
  });

  it("should never run more than maxInFlight handlers at once", async () => {
    let active = 0;
    let peak = 0;

    await runConsumerLoop(
      new ArraySource(messages(8)),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
      },
      { maxInFlight: 2, isShuttingDown: () => false }
    );

    expect(peak).toBe(2);
  });

  it("should nack with backoff when the handler throws", async () => {
    const message = buildQueueMessage("payload", { metadata: { deliveryAttemptCount: 3 } });

    await runConsumerLoop(
      new ArraySource([message]),
      async () => {
        throw new Error("boom");
      },
      { maxInFlight: 1, isShuttingDown: () => false }
    );

    // 1s base doubled per prior delivery
    expect(message.nack).toHaveBeenCalledWith(4000);
    expect(message.ack).not.toHaveBeenCalled();
  });

  it("should release an unstarted message and stop once shutting down", async () => {
    const batch = messages(3);
    let handled = 0;

    await runConsumerLoop(
      new ArraySource(batch),
      async () => {
        handled++;
      },
      { maxInFlight: 1, isShuttingDown: () => true }
    );

    expect(handled).toBe(0);
    expect(batch[0]?.nack).toHaveBeenCalledWith();
    expect(batch[1]?.nack).not.toHaveBeenCalled();
  });
});
