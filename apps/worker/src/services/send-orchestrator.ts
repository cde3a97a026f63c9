import { classifyFault } from "../domain/fault-severity.js";
import { decodeSendJob } from "../domain/job-codec.js";
import type { AdmissionGate } from "../throttle/admission-gate.js";
import type { SendQueue } from "../queue/types.js";
import type { DeliveryMetadata, SendJob } from "../types/jobs.js";
import type { DelayRequeuer } from "./delay-requeuer.js";
import type { ParamsResolver } from "./params-resolver.js";
import type { ResultRecorder } from "./result-recorder.js";
import type { Sender } from "./sender.js";
import { invocationsTotal } from "../metrics.js";
import { log, createTimer, toError } from "../logger.js";

/**
 * What the queue host should do with the message after an invocation.
 *
 * - ack: consumed, never delivered again
 * - retry: the invocation faulted; redeliver (or dead-letter on the last delivery)
 */
export type ProcessDecision =
  | { kind: "ack" }
  | { kind: "retry"; error: Error; isLastDelivery: boolean };

export interface SendOrchestratorDeps {
  admissionGate: AdmissionGate;
  sendQueue: SendQueue;
  paramsResolver: ParamsResolver;
  sender: Sender;
  delayRequeuer: DelayRequeuer;
  resultRecorder: ResultRecorder;
}

export interface SendOrchestratorOptions {
  /** Attempts per send call before it is reported as throttled */
  maxNumberOfAttempts: number;
  /** Deferral applied after admission refusal or an exhausted throttled send */
  sendRetryDelaySeconds: number;
}

const ACK: ProcessDecision = { kind: "ack" };

/** Throttle responses seen so far, kept for the fault record */
interface InvocationProgress {
  throttleCount: number;
}

/**
 * Processes exactly one queue message per invocation:
 *
 *   admission -> resolve params -> send -> record | requeue
 *
 * Every path that completes acks the message. A fault (anything thrown)
 * leaves a diagnostic result record and asks the host to redeliver.
 */
export class SendOrchestrator {
  constructor(
    private deps: SendOrchestratorDeps,
    private options: SendOrchestratorOptions
  ) {}

  async handle(payload: string, metadata: DeliveryMetadata): Promise<ProcessDecision> {
    let job: SendJob;
    try {
      job = decodeSendJob(payload);
    } catch (error) {
      // Nothing identifies the recipient, so there is nothing to record
      const err = toError(error);
      const { isLastDelivery } = classifyFault(metadata.deliveryAttemptCount);
      invocationsTotal.inc({ path: "undecodable" });
      log.orchestrator.error(
        { messageId: metadata.messageId, deliveryAttemptCount: metadata.deliveryAttemptCount, error: err.message },
        "undecodable payload"
      );
      return { kind: "retry", error: err, isLastDelivery };
    }

    const progress: InvocationProgress = { throttleCount: 0 };
    try {
      return await this.process(job, progress);
    } catch (error) {
      return this.handleFault(job, metadata, progress, toError(error));
    }
  }

  private async process(job: SendJob, progress: InvocationProgress): Promise<ProcessDecision> {
    const { notificationId, recipientId } = job;
    const { maxNumberOfAttempts, sendRetryDelaySeconds } = this.options;
    const timer = createTimer();

    const admission = await this.deps.admissionGate.checkAdmission();
    if (admission === "defer") {
      // The global deadline is already set; only the job goes back
      await this.deps.sendQueue.enqueueDelayed(job, sendRetryDelaySeconds);
      invocationsTotal.inc({ path: "deferred" });
      log.orchestrator.debug({ notificationId, recipientId, delaySeconds: sendRetryDelaySeconds }, "deferred");
      return ACK;
    }

    const resolution = await this.deps.paramsResolver.resolveParams(job);
    if (resolution.forceStop) {
      invocationsTotal.inc({ path: "force_stopped" });
      log.orchestrator.debug({ notificationId, recipientId }, "stopped during param resolution");
      return ACK;
    }

    progress.throttleCount = resolution.throttleCount;

    const result = await this.deps.sender.send(resolution.params, maxNumberOfAttempts);
    progress.throttleCount += result.throttleCount;
    const totalThrottleCount = progress.throttleCount;
    const outcome = result.outcome;

    switch (outcome.type) {
      case "succeeded":
        await this.deps.resultRecorder.record({
          notificationId,
          recipientId: resolution.recipientId,
          totalThrottleCount,
          fromParameterResolution: false,
          statusCode: outcome.statusCode,
        });
        invocationsTotal.inc({ path: "succeeded" });
        log.orchestrator.info(
          { notificationId, recipientId, statusCode: outcome.statusCode, throttles: totalThrottleCount, duration: timer() },
          "sent"
        );
        return ACK;

      case "throttled":
        await this.deps.delayRequeuer.delayAndRequeue(job, sendRetryDelaySeconds);
        invocationsTotal.inc({ path: "throttled" });
        log.orchestrator.warn(
          { notificationId, recipientId, throttles: totalThrottleCount, delaySeconds: sendRetryDelaySeconds },
          "throttled, requeued with global backoff"
        );
        return ACK;

      case "failed":
        await this.deps.resultRecorder.record({
          notificationId,
          recipientId: resolution.recipientId,
          totalThrottleCount,
          fromParameterResolution: false,
          statusCode: outcome.statusCode,
          errorMessage: outcome.errorMessage,
        });
        invocationsTotal.inc({ path: "failed" });
        log.orchestrator.error(
          { notificationId, recipientId, statusCode: outcome.statusCode, error: outcome.errorMessage },
          "send failed"
        );
        return ACK;
    }
  }

  private async handleFault(
    job: SendJob,
    metadata: DeliveryMetadata,
    progress: InvocationProgress,
    error: Error
  ): Promise<ProcessDecision> {
    const { notificationId, recipientId } = job;
    const { isLastDelivery, statusCode } = classifyFault(metadata.deliveryAttemptCount);

    log.orchestrator.error(
      {
        notificationId,
        recipientId,
        messageId: metadata.messageId,
        deliveryAttemptCount: metadata.deliveryAttemptCount,
        isLastDelivery,
        error: error.message,
      },
      "invocation faulted"
    );

    try {
      await this.deps.resultRecorder.record({
        notificationId,
        recipientId,
        totalThrottleCount: progress.throttleCount,
        fromParameterResolution: false,
        statusCode,
        errorMessage: error.message,
      });
    } catch (recordError) {
      // The original fault still drives redelivery
      log.orchestrator.error(
        { notificationId, recipientId, error: toError(recordError).message },
        "failed to record fault"
      );
    }

    invocationsTotal.inc({ path: isLastDelivery ? "fault_dead_letter" : "fault_retry" });
    return { kind: "retry", error, isLastDelivery };
  }
}
