import { describe, it, expect } from "vitest";
import { classifyFault, MAX_DELIVERY_COUNT_FOR_DEAD_LETTER } from "../../../domain/fault-severity.js";

describe("classifyFault", () => {
  it("should dead-letter at 10 deliveries", () => {
    expect(MAX_DELIVERY_COUNT_FOR_DEAD_LETTER).toBe(10);
  });

  it("should report status 100 before the last delivery", () => {
    expect(classifyFault(1)).toEqual({ isLastDelivery: false, statusCode: 100 });
    expect(classifyFault(9)).toEqual({ isLastDelivery: false, statusCode: 100 });
  });

  it("should report status 500 on the last delivery", () => {
    expect(classifyFault(10)).toEqual({ isLastDelivery: true, statusCode: 500 });
  });

  it("should treat counts past the limit as last delivery", () => {
    expect(classifyFault(11)).toEqual({ isLastDelivery: true, statusCode: 500 });
  });
});
