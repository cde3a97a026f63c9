import type { GlobalThrottleState } from "../domain/admission.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import { log } from "../logger.js";

export type { GlobalThrottleState };

/**
 * Shared "system-wide retry-not-before" record.
 *
 * Eventually consistent by contract: reads and writes are NOT coordinated (no
 * lock, no transaction, no compare-and-swap). Two workers may race a read
 * against a write; the worst case is a handful of extra sends during a
 * throttle window, or one worker missing a deadline set milliseconds earlier.
 * Implementations must not try to make this atomic.
 */
export interface GlobalThrottleStore {
  get(): Promise<GlobalThrottleState>;
  set(retryNotBefore: Date): Promise<void>;
}

export const GLOBAL_THROTTLE_KEY = "notify:global:retry_not_before";

/**
 * The two commands the store issues. An ioredis client satisfies it.
 */
export interface ThrottleKeyClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
}

export interface RedisGlobalThrottleStoreOptions {
  key?: string;
  /** How long the key outlives its deadline (default: 60s) */
  expiryGraceMs?: number;
  time?: TimeProvider;
}

/**
 * Deadline stored as epoch milliseconds under one key. The key expires a
 * little after the deadline so an old throttle window never lingers.
 */
export class RedisGlobalThrottleStore implements GlobalThrottleStore {
  private readonly key: string;
  private readonly expiryGraceMs: number;
  private readonly time: TimeProvider;

  constructor(private redis: ThrottleKeyClient, options: RedisGlobalThrottleStoreOptions = {}) {
    this.key = options.key ?? GLOBAL_THROTTLE_KEY;
    this.expiryGraceMs = options.expiryGraceMs ?? 60_000;
    this.time = options.time ?? new SystemTimeProvider();
  }

  async get(): Promise<GlobalThrottleState> {
    const raw = await this.redis.get(this.key);
    if (raw === null) {
      return {};
    }

    const epochMs = Number(raw);
    if (!Number.isFinite(epochMs)) {
      log.throttle.warn({ key: this.key, raw }, "ignoring malformed throttle deadline");
      return {};
    }

    return { retryNotBefore: new Date(epochMs) };
  }

  async set(retryNotBefore: Date): Promise<void> {
    const epochMs = retryNotBefore.getTime();
    const ttlMs = Math.max(epochMs - this.time.now(), 0) + this.expiryGraceMs;

    await this.redis.set(this.key, String(epochMs), "PX", ttlMs);
    log.throttle.warn({ retryNotBefore: retryNotBefore.toISOString() }, "global throttle deadline set");
  }
}
