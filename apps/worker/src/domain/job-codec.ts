import { z } from "zod";
import type { SendJob } from "../types/jobs.js";

const resolvedSendParamsSchema = z.object({
  serviceUrl: z.string().url(),
  conversationId: z.string().min(1),
});

const recipientDataSchema = z.object({
  recipientType: z.enum(["user", "channel"]).default("user"),
  serviceUrl: z.string().url(),
  conversationId: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
  tenantId: z.string().min(1).optional(),
});

const sendJobSchema = z.object({
  notificationId: z.string().min(1),
  recipientId: z.string().min(1),
  recipientData: recipientDataSchema,
  resolvedParams: resolvedSendParamsSchema.optional(),
});

export class JobDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobDecodeError";
  }
}

/**
 * Parse a raw queue payload into a SendJob.
 * Unknown fields are dropped; re-encoding yields the canonical form.
 */
export function decodeSendJob(payload: string): SendJob {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JobDecodeError(`Payload is not valid JSON: ${reason}`);
  }

  const result = sendJobSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new JobDecodeError(`Invalid send job: ${issues}`);
  }
  return result.data;
}

export function encodeSendJob(job: SendJob): string {
  return JSON.stringify(job);
}
