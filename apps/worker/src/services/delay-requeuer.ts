import { computeRetryNotBefore } from "../domain/admission.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import type { GlobalThrottleStore } from "../throttle/global-throttle-store.js";
import type { SendQueue } from "../queue/types.js";
import type { SendJob } from "../types/jobs.js";
import { log } from "../logger.js";

/**
 * Coordinated backoff after the channel kept rate-limiting a job.
 */
export interface DelayRequeuer {
  delayAndRequeue(job: SendJob, delaySeconds: number): Promise<void>;
}

/**
 * Raises the global deadline, then puts the job back with the same delay.
 *
 * Both steps are awaited and any failure is thrown to the caller: losing the
 * requeue silently would drop the job.
 */
export class DelaySendingService implements DelayRequeuer {
  constructor(
    private throttleStore: GlobalThrottleStore,
    private queue: SendQueue,
    private time: TimeProvider = new SystemTimeProvider()
  ) {}

  async delayAndRequeue(job: SendJob, delaySeconds: number): Promise<void> {
    const retryNotBefore = computeRetryNotBefore(new Date(this.time.now()), delaySeconds);

    await this.throttleStore.set(retryNotBefore);
    await this.queue.enqueueDelayed(job, delaySeconds);

    log.queue.info(
      {
        notificationId: job.notificationId,
        recipientId: job.recipientId,
        delaySeconds,
        retryNotBefore: retryNotBefore.toISOString(),
      },
      "delayed and requeued"
    );
  }
}
