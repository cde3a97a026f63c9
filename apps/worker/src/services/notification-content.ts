import { eq } from "drizzle-orm";
import { z } from "zod";
import { notifications, type Database, type NotificationContent } from "@notify-relay/db";
import { log, toError } from "../logger.js";

/**
 * Read access to the content of a notification being sent.
 */
export interface NotificationContentSource {
  /** Content for the notification, or null when it does not exist */
  getContent(notificationId: string): Promise<NotificationContent | null>;
}

export class DrizzleNotificationContentSource implements NotificationContentSource {
  constructor(private db: Database) {}

  async getContent(notificationId: string): Promise<NotificationContent | null> {
    const row = await this.db.query.notifications.findFirst({
      where: eq(notifications.id, notificationId),
      columns: { content: true },
    });
    return row?.content ?? null;
  }
}

const cachedContentSchema = z.custom<NotificationContent>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value)
);

/**
 * The two commands the cache issues. An ioredis client satisfies it.
 */
export interface ContentCacheClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

/**
 * Dragonfly cache in front of a content source. Every recipient of a
 * notification reads the same content, so it is fetched from Postgres once
 * per TTL across all workers. Misses are not cached.
 *
 * Cache errors fall through to the inner source.
 */
export class CachedNotificationContentSource implements NotificationContentSource {
  constructor(
    private inner: NotificationContentSource,
    private redis: ContentCacheClient,
    private ttlSeconds: number = 60
  ) {}

  async getContent(notificationId: string): Promise<NotificationContent | null> {
    const key = `notify:content:${notificationId}`;

    const cached = await this.readCached(key);
    if (cached) {
      return cached;
    }

    const content = await this.inner.getContent(notificationId);
    if (content === null) {
      return null;
    }

    try {
      await this.redis.setex(key, this.ttlSeconds, JSON.stringify(content));
    } catch (error) {
      log.db.debug({ notificationId, error: toError(error).message }, "failed to cache notification content");
    }
    return content;
  }

  private async readCached(key: string): Promise<NotificationContent | null> {
    try {
      const raw = await this.redis.get(key);
      if (raw === null) return null;

      const parsed = cachedContentSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      log.db.debug({ key, error: toError(error).message }, "failed to read cached notification content");
      return null;
    }
  }
}
