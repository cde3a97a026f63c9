import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { createHealthServer } from "../../../entrypoints/shared.js";
import { invocationsTotal } from "../../../metrics.js";

describe("createHealthServer", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it("should answer liveness without running checks", async () => {
    let checked = false;
    app = createHealthServer("send-worker", {
      nats: async () => {
        checked = true;
        return true;
      },
    });

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok", service: "send-worker" });
    expect(checked).toBe(false);
  });

  it("should report degraded when a component check fails", async () => {
    app = createHealthServer("send-worker", {
      nats: async () => true,
      dragonfly: async () => false,
    });

    const response = await app.inject({ method: "GET", url: "/health/detailed" });

    expect(response.json()).toMatchObject({
      status: "degraded",
      components: { nats: "ok", dragonfly: "error" },
    });
  });

  it("should expose prometheus metrics", async () => {
    invocationsTotal.inc({ path: "succeeded" });
    app = createHealthServer("send-worker", {});

    const response = await app.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('notify_invocations_total{path="succeeded"}');
  });
});
