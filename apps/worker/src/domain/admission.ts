/**
 * Global throttle admission control.
 *
 * The whole system is back-pressured while the shared retry-not-before
 * deadline lies in the future; every worker checks it before doing any work.
 */

export interface GlobalThrottleState {
  /** System-wide deadline before which no send may be attempted */
  retryNotBefore?: Date;
}

export type AdmissionDecision = "admit" | "defer";

/**
 * @example
 * checkAdmission({}, now) // "admit"
 * checkAdmission({ retryNotBefore: new Date(now.getTime() + 1000) }, now) // "defer"
 */
export function checkAdmission(state: GlobalThrottleState, now: Date): AdmissionDecision {
  if (state.retryNotBefore && now.getTime() < state.retryNotBefore.getTime()) {
    return "defer";
  }
  return "admit";
}

/**
 * Deadline written when a send exhausts its attempts on rate-limit responses.
 */
export function computeRetryNotBefore(now: Date, delaySeconds: number): Date {
  return new Date(now.getTime() + Math.round(delaySeconds * 1000));
}
