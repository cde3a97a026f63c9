import { describe, it, expect } from "vitest";
import { toDeliveryStatus } from "../../../domain/delivery-status.js";

describe("toDeliveryStatus", () => {
  it("should map every 2xx to succeeded", () => {
    expect(toDeliveryStatus(200)).toBe("succeeded");
    expect(toDeliveryStatus(201)).toBe("succeeded");
    expect(toDeliveryStatus(299)).toBe("succeeded");
  });

  it("should map fault statuses", () => {
    expect(toDeliveryStatus(100)).toBe("retrying");
    expect(toDeliveryStatus(500)).toBe("failed");
  });

  it("should map channel rejections", () => {
    expect(toDeliveryStatus(429)).toBe("throttled");
    expect(toDeliveryStatus(404)).toBe("recipient_not_found");
    expect(toDeliveryStatus(403)).toBe("failed");
  });
});
