/**
 * In-memory store for mock conversations and the activities posted to them
 */

import type { ChannelOutcome } from "./config.js";

export interface StoredConversation {
  id: string;
  userId: string;
  tenantId?: string;
  createdAt: number;
}

export interface StoredActivity {
  id: string;
  conversationId: string;
  text?: string;
  createdAt: number;
}

export interface StoreStats {
  conversations: number;
  activities: number;
  throttled: number;
  notFound: number;
  failed: number;
}

class ChannelStore {
  private conversations = new Map<string, StoredConversation>();
  private activities: StoredActivity[] = [];
  private rejected: Record<Exclude<ChannelOutcome, "accepted">, number> = {
    throttled: 0,
    not_found: 0,
    failed: 0,
  };
  private counter = 0;

  private nextId(prefix: string): string {
    this.counter++;
    return `${prefix}-${this.counter.toString().padStart(6, "0")}`;
  }

  /** One conversation per user, like the real channel */
  addConversation(userId: string, tenantId?: string): StoredConversation {
    for (const conversation of this.conversations.values()) {
      if (conversation.userId === userId) return conversation;
    }

    const stored: StoredConversation = { id: this.nextId("conv"), userId, tenantId, createdAt: Date.now() };
    this.conversations.set(stored.id, stored);
    return stored;
  }

  hasConversation(id: string): boolean {
    return this.conversations.has(id);
  }

  addActivity(conversationId: string, text?: string): StoredActivity {
    const stored: StoredActivity = { id: this.nextId("act"), conversationId, text, createdAt: Date.now() };
    this.activities.push(stored);
    return stored;
  }

  getActivities(conversationId?: string): StoredActivity[] {
    return conversationId
      ? this.activities.filter((a) => a.conversationId === conversationId)
      : [...this.activities];
  }

  countRejected(outcome: Exclude<ChannelOutcome, "accepted">): void {
    this.rejected[outcome]++;
  }

  getStats(): StoreStats {
    return {
      conversations: this.conversations.size,
      activities: this.activities.length,
      throttled: this.rejected.throttled,
      notFound: this.rejected.not_found,
      failed: this.rejected.failed,
    };
  }

  reset(): void {
    this.conversations.clear();
    this.activities = [];
    this.rejected = { throttled: 0, not_found: 0, failed: 0 };
    this.counter = 0;
  }
}

export const store = new ChannelStore();
