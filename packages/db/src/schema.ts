import {
  pgTable,
  varchar,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  index,
  pgEnum,
  primaryKey,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Enums
export const deliveryStatusEnum = pgEnum("delivery_status", [
  "succeeded",
  "retrying",
  "throttled",
  "recipient_not_found",
  "failed",
]);

export type DeliveryStatus = (typeof deliveryStatusEnum.enumValues)[number];

/**
 * Message body posted to the conversation. Stored as authored; the worker does
 * not interpret it beyond passing it to the channel.
 */
export interface NotificationContent {
  text?: string;
  attachments?: Array<{ contentType: string; content: unknown }>;
  [key: string]: unknown;
}

// Notifications ready to be sent (authored elsewhere)
export const notifications = pgTable("notifications", {
  id: varchar("id", { length: 64 }).primaryKey(),
  title: varchar("title", { length: 500 }).notNull(),
  content: jsonb("content").$type<NotificationContent>().notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// One row per (notification, recipient); overwritten by each recorded outcome
export const sentNotifications = pgTable(
  "sent_notifications",
  {
    notificationId: varchar("notification_id", { length: 64 })
      .notNull()
      .references(() => notifications.id, { onDelete: "cascade" }),
    recipientId: varchar("recipient_id", { length: 255 }).notNull(),
    deliveryStatus: deliveryStatusEnum("delivery_status").notNull(),
    statusCode: integer("status_code").notNull(),
    totalThrottleCount: integer("total_throttle_count").default(0).notNull(),
    isStatusCodeFromCreateConversation: boolean("is_status_code_from_create_conversation")
      .default(false)
      .notNull(),
    errorMessage: text("error_message"),
    sentAt: timestamp("sent_at"),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.notificationId, table.recipientId] }),
    statusIdx: index("sent_notifications_status_idx").on(table.notificationId, table.deliveryStatus),
  })
);

// Relations
export const notificationsRelations = relations(notifications, ({ many }) => ({
  results: many(sentNotifications),
}));

export const sentNotificationsRelations = relations(sentNotifications, ({ one }) => ({
  notification: one(notifications, {
    fields: [sentNotifications.notificationId],
    references: [notifications.id],
  }),
}));

// Types
export type Notification = typeof notifications.$inferSelect;
export type NewNotification = typeof notifications.$inferInsert;
export type SentNotification = typeof sentNotifications.$inferSelect;
export type NewSentNotification = typeof sentNotifications.$inferInsert;
