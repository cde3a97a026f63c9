import type { DeliveryMetadata, SendJob } from "../types/jobs.js";

/**
 * Publishing side of the send queue, as seen by the core.
 */
export interface SendQueue {
  enqueue(job: SendJob): Promise<void>;
  /** Make the job visible to workers again after delaySeconds */
  enqueueDelayed(job: SendJob, delaySeconds: number): Promise<void>;
}

/**
 * One delivery of a queue message to this worker.
 */
export interface QueueMessage {
  payload: string;
  metadata: DeliveryMetadata;
  traceId?: string;
  /** Broker header lookup; undefined when absent */
  header(name: string): string | undefined;
  /** Consumed; the queue must not deliver it again */
  ack(): void;
  /** Not consumed; the queue redelivers it (after delayMs when given) or dead-letters it */
  nack(delayMs?: number): void;
}

/**
 * Consumption side of a queue, independent of the broker behind it.
 */
export interface MessageSource {
  readonly name: string;
  receive(): AsyncIterable<QueueMessage>;
}
