import type { DeliveryStatus } from "@notify-relay/db";
import { StatusCode, isSuccessStatus } from "./outcome.js";

/**
 * Delivery status stored next to the raw status code of a result record.
 */
export function toDeliveryStatus(statusCode: number): DeliveryStatus {
  if (isSuccessStatus(statusCode)) return "succeeded";

  switch (statusCode) {
    case StatusCode.Continue:
      return "retrying";
    case StatusCode.TooManyRequests:
      return "throttled";
    case StatusCode.NotFound:
      return "recipient_not_found";
    default:
      return "failed";
  }
}
