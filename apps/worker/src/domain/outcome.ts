/**
 * Send outcomes and the HTTP status codes the worker records with them.
 */

export const StatusCode = {
  Continue: 100,
  NotFound: 404,
  TooManyRequests: 429,
  InternalServerError: 500,
} as const;

export type SendOutcome =
  | { type: "succeeded"; statusCode: number }
  | { type: "throttled"; statusCode: number }
  | { type: "failed"; statusCode: number; errorMessage: string };

export function succeeded(statusCode: number): SendOutcome {
  return { type: "succeeded", statusCode };
}

export function throttled(statusCode: number = StatusCode.TooManyRequests): SendOutcome {
  return { type: "throttled", statusCode };
}

export function failed(statusCode: number, errorMessage: string): SendOutcome {
  return { type: "failed", statusCode, errorMessage };
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export function isThrottleStatus(statusCode: number): boolean {
  return statusCode === StatusCode.TooManyRequests;
}
