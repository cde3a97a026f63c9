import { describe, it, expect, vi } from "vitest";
import { SendOrchestrator } from "../../../services/send-orchestrator.js";
import { DelaySendingService } from "../../../services/delay-requeuer.js";
import type { ParamsResolver } from "../../../services/params-resolver.js";
import type { Sender } from "../../../services/sender.js";
import { AdmissionGate } from "../../../throttle/admission-gate.js";
import { MockTimeProvider } from "../../../domain/utils/time.js";
import { encodeSendJob } from "../../../domain/job-codec.js";
import { failed, succeeded, throttled } from "../../../domain/outcome.js";
import type { GlobalThrottleState } from "../../../domain/admission.js";
import {
  buildJob,
  buildMetadata,
  InMemoryGlobalThrottleStore,
  RecordingResultRecorder,
  RecordingSendQueue,
} from "../../../../test/fakes.js";

const NOW = Date.parse("2024-06-01T12:00:00.000Z");
const DELAY_SECONDS = 660;

const job = buildJob({ notificationId: "N1", recipientId: "R1" });
const payload = encodeSendJob(job);
const params = { serviceUrl: "https://channel.test", conversationId: "conv-1", content: { text: "Hello" } };

function setup(state: GlobalThrottleState = {}) {
  const time = new MockTimeProvider(NOW);
  const throttleStore = new InMemoryGlobalThrottleStore(state);
  const sendQueue = new RecordingSendQueue();
  const resultRecorder = new RecordingResultRecorder();
  const delayRequeuer = new DelaySendingService(throttleStore, sendQueue, time);

  const resolveParams = vi.fn<ParamsResolver["resolveParams"]>(async () => ({
    forceStop: false,
    throttleCount: 0,
    params,
    recipientId: "R1",
  }));
  const send = vi.fn<Sender["send"]>(async () => ({ outcome: succeeded(200), throttleCount: 0 }));

  const orchestrator = new SendOrchestrator(
    {
      admissionGate: new AdmissionGate(throttleStore, time),
      sendQueue,
      paramsResolver: { resolveParams },
      sender: { send },
      delayRequeuer,
      resultRecorder,
    },
    { maxNumberOfAttempts: 3, sendRetryDelaySeconds: DELAY_SECONDS }
  );

  return { orchestrator, throttleStore, sendQueue, resultRecorder, resolveParams, send };
}

describe("SendOrchestrator", () => {
  describe("admission", () => {
    it("should defer without touching resolver, sender or recorder while the deadline is ahead", async () => {
      const ctx = setup({ retryNotBefore: new Date(NOW + 30_000) });

      const decision = await ctx.orchestrator.handle(payload, buildMetadata());

      expect(decision).toEqual({ kind: "ack" });
      expect(ctx.sendQueue.delayed).toEqual([{ job, delaySeconds: DELAY_SECONDS }]);
      expect(ctx.resolveParams).not.toHaveBeenCalled();
      expect(ctx.send).not.toHaveBeenCalled();
      expect(ctx.resultRecorder.records).toEqual([]);
      // Deferral leaves the deadline alone
      expect(ctx.throttleStore.writes).toEqual([]);
    });

    it("should admit once the deadline has passed", async () => {
      const ctx = setup({ retryNotBefore: new Date(NOW - 1) });

      await ctx.orchestrator.handle(payload, buildMetadata());

      expect(ctx.send).toHaveBeenCalledOnce();
      expect(ctx.sendQueue.delayed).toEqual([]);
    });
  });

  describe("outcomes", () => {
    it("should record a success once with no requeue", async () => {
      const ctx = setup();

      const decision = await ctx.orchestrator.handle(payload, buildMetadata());

      expect(decision).toEqual({ kind: "ack" });
      expect(ctx.resultRecorder.records).toEqual([
        { notificationId: "N1", recipientId: "R1", totalThrottleCount: 0, fromParameterResolution: false, statusCode: 200 },
      ]);
      expect(ctx.sendQueue.delayed).toEqual([]);
      expect(ctx.send).toHaveBeenCalledWith(params, 3);
    });

    it("should sum resolution and send throttle counts", async () => {
      const ctx = setup();
      ctx.resolveParams.mockResolvedValue({ forceStop: false, throttleCount: 2, params, recipientId: "R1" });
      ctx.send.mockResolvedValue({ outcome: succeeded(201), throttleCount: 3 });

      await ctx.orchestrator.handle(payload, buildMetadata());

      expect(ctx.resultRecorder.records).toEqual([
        { notificationId: "N1", recipientId: "R1", totalThrottleCount: 5, fromParameterResolution: false, statusCode: 201 },
      ]);
    });

    it("should requeue a throttled send and raise the global deadline", async () => {
      const ctx = setup();
      ctx.send.mockResolvedValue({ outcome: throttled(), throttleCount: 3 });

      const decision = await ctx.orchestrator.handle(payload, buildMetadata());

      expect(decision).toEqual({ kind: "ack" });
      expect(ctx.resultRecorder.records).toEqual([]);
      expect(ctx.sendQueue.delayed).toEqual([{ job, delaySeconds: DELAY_SECONDS }]);
      expect(ctx.throttleStore.writes).toEqual([new Date(NOW + DELAY_SECONDS * 1000)]);
    });

    it("should record a failed send with its status and error", async () => {
      const ctx = setup();
      ctx.send.mockResolvedValue({ outcome: failed(403, "HTTP 403: Bot blocked"), throttleCount: 1 });

      const decision = await ctx.orchestrator.handle(payload, buildMetadata());

      expect(decision).toEqual({ kind: "ack" });
      expect(ctx.resultRecorder.records).toEqual([
        {
          notificationId: "N1",
          recipientId: "R1",
          totalThrottleCount: 1,
          fromParameterResolution: false,
          statusCode: 403,
          errorMessage: "HTTP 403: Bot blocked",
        },
      ]);
      expect(ctx.sendQueue.delayed).toEqual([]);
    });

    it("should ack without sending when the resolver stops", async () => {
      const ctx = setup();
      ctx.resolveParams.mockResolvedValue({ forceStop: true });

      const decision = await ctx.orchestrator.handle(payload, buildMetadata());

      expect(decision).toEqual({ kind: "ack" });
      expect(ctx.send).not.toHaveBeenCalled();
      expect(ctx.resultRecorder.records).toEqual([]);
    });
  });

  describe("faults", () => {
    it("should record a continue status and retry before the last delivery", async () => {
      const ctx = setup();
      const error = new Error("socket hang up");
      ctx.send.mockRejectedValue(error);

      const decision = await ctx.orchestrator.handle(payload, buildMetadata({ deliveryAttemptCount: 3 }));

      expect(decision).toEqual({ kind: "retry", error, isLastDelivery: false });
      expect(ctx.resultRecorder.records).toEqual([
        {
          notificationId: "N1",
          recipientId: "R1",
          totalThrottleCount: 0,
          fromParameterResolution: false,
          statusCode: 100,
          errorMessage: "socket hang up",
        },
      ]);
    });

    it("should record an internal-error status on the last delivery", async () => {
      const ctx = setup();
      const error = new Error("socket hang up");
      ctx.send.mockRejectedValue(error);

      const decision = await ctx.orchestrator.handle(payload, buildMetadata({ deliveryAttemptCount: 10 }));

      expect(decision).toEqual({ kind: "retry", error, isLastDelivery: true });
      expect(ctx.resultRecorder.records).toHaveLength(1);
      expect(ctx.resultRecorder.records[0]?.statusCode).toBe(500);
    });

    it("should keep throttles seen before the fault in its record", async () => {
      const ctx = setup();
      ctx.resolveParams.mockResolvedValue({ forceStop: false, throttleCount: 4, params, recipientId: "R1" });
      ctx.send.mockRejectedValue(new Error("timeout"));

      await ctx.orchestrator.handle(payload, buildMetadata({ deliveryAttemptCount: 2 }));

      expect(ctx.resultRecorder.records[0]?.totalThrottleCount).toBe(4);
    });

    it("should treat a failed requeue as a fault", async () => {
      const ctx = setup();
      ctx.send.mockResolvedValue({ outcome: throttled(), throttleCount: 3 });
      ctx.sendQueue.failWith = new Error("publish timed out");

      const decision = await ctx.orchestrator.handle(payload, buildMetadata({ deliveryAttemptCount: 1 }));

      expect(decision).toEqual({ kind: "retry", error: ctx.sendQueue.failWith, isLastDelivery: false });
      expect(ctx.resultRecorder.records).toEqual([
        {
          notificationId: "N1",
          recipientId: "R1",
          totalThrottleCount: 3,
          fromParameterResolution: false,
          statusCode: 100,
          errorMessage: "publish timed out",
        },
      ]);
    });

    it("should still retry with the original error when recording the fault fails", async () => {
      const ctx = setup();
      const error = new Error("resolver exploded");
      ctx.resolveParams.mockRejectedValue(error);
      ctx.resultRecorder.failWith = new Error("database unavailable");

      const decision = await ctx.orchestrator.handle(payload, buildMetadata({ deliveryAttemptCount: 5 }));

      expect(decision).toEqual({ kind: "retry", error, isLastDelivery: false });
    });

    it("should retry an undecodable payload without recording", async () => {
      const ctx = setup();

      const decision = await ctx.orchestrator.handle("{not json", buildMetadata({ deliveryAttemptCount: 10 }));

      expect(decision.kind).toBe("retry");
      expect(decision.kind === "retry" && decision.isLastDelivery).toBe(true);
      expect(ctx.resolveParams).not.toHaveBeenCalled();
      expect(ctx.resultRecorder.records).toEqual([]);
    });
  });
});
