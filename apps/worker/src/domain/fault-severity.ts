import { StatusCode } from "./outcome.js";

/**
 * Delivery count at which the queue stops redelivering a message. Kept equal to
 * the send consumer's max_deliver; it must never exceed the broker's ceiling,
 * otherwise the terminal record would never be written.
 */
export const MAX_DELIVERY_COUNT_FOR_DEAD_LETTER = 10;

export interface FaultSeverity {
  /** True when the queue will not hand this message to a worker again */
  isLastDelivery: boolean;
  /** Status stored with the diagnostic result record */
  statusCode: number;
}

/**
 * Map the host-supplied delivery attempt count (1 on first delivery) of a
 * faulted invocation to the status recorded for it.
 */
export function classifyFault(deliveryAttemptCount: number): FaultSeverity {
  const isLastDelivery = deliveryAttemptCount >= MAX_DELIVERY_COUNT_FOR_DEAD_LETTER;
  return {
    isLastDelivery,
    statusCode: isLastDelivery ? StatusCode.InternalServerError : StatusCode.Continue,
  };
}
