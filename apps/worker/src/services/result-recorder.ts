import { sentNotifications, type Database } from "@notify-relay/db";
import { toDeliveryStatus } from "../domain/delivery-status.js";
import { isSuccessStatus } from "../domain/outcome.js";
import type { ResultRecord } from "../types/jobs.js";
import { log } from "../logger.js";

/**
 * Durable outcome bookkeeping for (notification, recipient) pairs.
 *
 * Must tolerate being called more than once for the same pair: the queue
 * redelivers messages and the core never deduplicates across invocations.
 */
export interface ResultRecorder {
  record(result: ResultRecord): Promise<void>;
}

/**
 * Upserts one sent_notifications row per pair. A later write replaces the
 * earlier one entirely (last write wins); counts are not accumulated.
 */
export class DrizzleResultRecorder implements ResultRecorder {
  constructor(private db: Database) {}

  async record(result: ResultRecord): Promise<void> {
    const now = new Date();
    const values = {
      deliveryStatus: toDeliveryStatus(result.statusCode),
      statusCode: result.statusCode,
      totalThrottleCount: result.totalThrottleCount,
      isStatusCodeFromCreateConversation: result.fromParameterResolution,
      errorMessage: result.errorMessage ?? null,
      sentAt: isSuccessStatus(result.statusCode) ? now : null,
      updatedAt: now,
    };

    await this.db
      .insert(sentNotifications)
      .values({
        notificationId: result.notificationId,
        recipientId: result.recipientId,
        ...values,
      })
      .onConflictDoUpdate({
        target: [sentNotifications.notificationId, sentNotifications.recipientId],
        set: values,
      });

    log.db.debug(
      {
        notificationId: result.notificationId,
        recipientId: result.recipientId,
        deliveryStatus: values.deliveryStatus,
        statusCode: result.statusCode,
      },
      "result recorded"
    );
  }
}
