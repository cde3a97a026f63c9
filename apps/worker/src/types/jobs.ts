/**
 * Job Types - shared across the worker
 *
 * Single source of truth for queue message shapes used by:
 * - Queue service (publish)
 * - Orchestrator and collaborators (consume)
 */

import type { NotificationContent } from "@notify-relay/db";

export type RecipientType = "user" | "channel";

/**
 * Recipient-specific data produced upstream when the recipient list was built.
 */
export interface RecipientData {
  recipientType: RecipientType;
  /** Base URL of the channel service hosting the conversation */
  serviceUrl: string;
  /** Existing conversation with the recipient, if one is known */
  conversationId?: string;
  /** Channel user id, required to create a conversation */
  userId?: string;
  tenantId?: string;
}

/**
 * Destination already established by an earlier step.
 */
export interface ResolvedSendParams {
  serviceUrl: string;
  conversationId: string;
}

/**
 * Everything the sender needs for one delivery.
 */
export interface SendParams extends ResolvedSendParams {
  content: NotificationContent;
}

/**
 * Queue payload: "deliver this notification to this recipient".
 */
export interface SendJob {
  notificationId: string;
  recipientId: string;
  recipientData: RecipientData;
  resolvedParams?: ResolvedSendParams;
}

/**
 * Per-invocation facts supplied by the queue host, never part of the payload.
 */
export interface DeliveryMetadata {
  /** How many times this message has been handed to a worker, including now */
  deliveryAttemptCount: number;
  enqueuedAtUtc: Date;
  messageId: string;
}

/**
 * Durable outcome for a (notification, recipient) pair.
 */
export interface ResultRecord {
  notificationId: string;
  recipientId: string;
  totalThrottleCount: number;
  fromParameterResolution: boolean;
  statusCode: number;
  errorMessage?: string;
}
