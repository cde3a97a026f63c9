import {
  failed,
  isSuccessStatus,
  isThrottleStatus,
  succeeded,
  throttled,
  type SendOutcome,
} from "../domain/outcome.js";
import { calculateThrottleWait, type BackoffOptions } from "../domain/utils/backoff.js";
import type { DelayProvider } from "../domain/utils/retry.js";
import { describeChannelError, type ChannelResponse } from "./channel-client.js";

export interface ThrottledCallOptions {
  maxAttempts: number;
  delayProvider: DelayProvider;
  backoff?: BackoffOptions;
  /** Called after every rate-limited response */
  onThrottle?: (attempt: number, response: ChannelResponse) => void;
}

export interface ThrottledCallResult {
  outcome: SendOutcome;
  throttleCount: number;
  /** Last response received, absent only when no attempt was made */
  response?: ChannelResponse;
}

/**
 * Run a channel call up to maxAttempts times.
 *
 * - 2xx: succeeded on that attempt
 * - 429: counted; retried after a wait while attempts remain, throttled once they run out
 * - anything else: failed immediately, never retried
 *
 * Thrown errors are not caught.
 */
export async function callWithThrottleRetries(
  call: () => Promise<ChannelResponse>,
  options: ThrottledCallOptions
): Promise<ThrottledCallResult> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  let throttleCount = 0;
  let lastResponse: ChannelResponse | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const response = await call();
    lastResponse = response;

    if (isSuccessStatus(response.status)) {
      return { outcome: succeeded(response.status), throttleCount, response };
    }

    if (!isThrottleStatus(response.status)) {
      return {
        outcome: failed(response.status, describeChannelError(response)),
        throttleCount,
        response,
      };
    }

    throttleCount++;
    options.onThrottle?.(attempt, response);

    if (attempt < maxAttempts) {
      await options.delayProvider.delay(
        calculateThrottleWait(throttleCount, response.retryAfterMs, options.backoff)
      );
    }
  }

  return { outcome: throttled(), throttleCount, response: lastResponse };
}
