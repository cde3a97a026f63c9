import { describe, it, expect } from "vitest";
import { checkAdmission, computeRetryNotBefore } from "../../../domain/admission.js";

describe("checkAdmission", () => {
  const now = new Date("2024-03-01T12:00:00.000Z");

  it("should admit when no deadline is set", () => {
    expect(checkAdmission({}, now)).toBe("admit");
  });

  it("should defer while the deadline lies in the future", () => {
    const state = { retryNotBefore: new Date(now.getTime() + 1) };
    expect(checkAdmission(state, now)).toBe("defer");
  });

  it("should admit exactly at the deadline", () => {
    expect(checkAdmission({ retryNotBefore: now }, now)).toBe("admit");
  });

  it("should admit once the deadline has passed", () => {
    const state = { retryNotBefore: new Date(now.getTime() - 60_000) };
    expect(checkAdmission(state, now)).toBe("admit");
  });
});

describe("computeRetryNotBefore", () => {
  it("should add the delay to now", () => {
    const now = new Date("2024-03-01T12:00:00.000Z");
    expect(computeRetryNotBefore(now, 660).toISOString()).toBe("2024-03-01T12:11:00.000Z");
  });

  it("should accept fractional seconds", () => {
    const now = new Date(0);
    expect(computeRetryNotBefore(now, 1.5).getTime()).toBe(1500);
  });
});
