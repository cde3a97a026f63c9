import type { MessageSource, QueueMessage } from "./types.js";
import { calculateNatsBackoff } from "../domain/utils/backoff.js";
import { log } from "../logger.js";

export interface ConsumerLoopOptions {
  /** Backpressure limit on concurrently processed messages */
  maxInFlight: number;
  /** Checked before every message is accepted */
  isShuttingDown: () => boolean;
}

/**
 * Pull messages from a source and process them in parallel.
 *
 * The handler owns ack/nack. A handler that throws gets its message nacked
 * with a backoff so it is never lost. On exit (source ends or shutdown) the
 * loop waits for every in-flight message.
 */
export async function runConsumerLoop(
  source: MessageSource,
  handler: (message: QueueMessage) => Promise<void>,
  options: ConsumerLoopOptions
): Promise<void> {
  const inFlight = new Set<Promise<void>>();
  const maxInFlight = Math.max(1, options.maxInFlight);

  log.queue.info({ consumer: source.name, maxInFlight }, "consumer loop started");

  try {
    for await (const message of source.receive()) {
      if (options.isShuttingDown()) {
        // Not started; let the queue hand it out again right away
        message.nack();
        break;
      }

      if (inFlight.size >= maxInFlight) {
        await Promise.race(inFlight);
      }

      const processing = (async () => {
        try {
          await handler(message);
        } catch (error) {
          log.queue.error(
            { error, messageId: message.metadata.messageId, consumer: source.name },
            "message handler failed"
          );
          message.nack(calculateNatsBackoff(message.metadata.deliveryAttemptCount));
        }
      })();

      inFlight.add(processing);
      void processing.finally(() => inFlight.delete(processing));
    }
  } finally {
    if (inFlight.size > 0) {
      log.queue.info({ consumer: source.name, inFlight: inFlight.size }, "waiting for in-flight messages");
      await Promise.allSettled(inFlight);
    }
    log.queue.info({ consumer: source.name }, "consumer loop stopped");
  }
}
