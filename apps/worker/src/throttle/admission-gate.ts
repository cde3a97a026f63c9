import { checkAdmission, type AdmissionDecision } from "../domain/admission.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";
import type { GlobalThrottleStore } from "./global-throttle-store.js";

/**
 * First check of every invocation: is the whole system currently backing off?
 */
export class AdmissionGate {
  constructor(
    private store: GlobalThrottleStore,
    private time: TimeProvider = new SystemTimeProvider()
  ) {}

  async checkAdmission(): Promise<AdmissionDecision> {
    const state = await this.store.get();
    return checkAdmission(state, new Date(this.time.now()));
  }
}
