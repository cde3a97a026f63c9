import type { NotificationContent } from "@notify-relay/db";
import { log, createTimer } from "../logger.js";

// =============================================================================
// Channel Client
// =============================================================================
// Thin HTTP client for the conversation-based channel the notifications are
// delivered through. It performs exactly one request per call and reports the
// status; retry policy lives with the caller. Transport failures (DNS, reset,
// timeout) are thrown.
// =============================================================================

export interface ChannelResponse {
  status: number;
  body: unknown;
  /** Parsed Retry-After header, in milliseconds */
  retryAfterMs?: number;
}

export interface SendMessageRequest {
  serviceUrl: string;
  conversationId: string;
  content: NotificationContent;
}

export interface CreateConversationRequest {
  serviceUrl: string;
  userId: string;
  tenantId?: string;
}

export interface ChannelClient {
  sendMessage(request: SendMessageRequest): Promise<ChannelResponse>;
  createConversation(request: CreateConversationRequest): Promise<ChannelResponse>;
}

export interface HttpChannelClientOptions {
  /** Bearer token presented to the channel */
  token: string;
  /** Per-request timeout (ms) */
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, nowMs: number = Date.now()): number | undefined {
  if (value === null || value.trim() === "") return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - nowMs);
}

/**
 * Short error text for a non-success response, used as the recorded error message.
 */
export function describeChannelError(response: ChannelResponse): string {
  const body = response.body;
  let detail = "";

  if (typeof body === "string") {
    detail = body;
  } else if (body && typeof body === "object") {
    const error = "error" in body ? body.error : undefined;
    if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
      detail = error.message;
    } else {
      detail = JSON.stringify(body);
    }
  }

  return detail ? `HTTP ${response.status}: ${detail.slice(0, 200)}` : `HTTP ${response.status}`;
}

// Non-JSON bodies are kept as text
function parseBody(text: string): unknown {
  if (!text) return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function trimTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

export class HttpChannelClient implements ChannelClient {
  private fetchImpl: typeof fetch;

  constructor(private options: HttpChannelClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async sendMessage(request: SendMessageRequest): Promise<ChannelResponse> {
    const url = `${trimTrailingSlash(request.serviceUrl)}/v3/conversations/${encodeURIComponent(request.conversationId)}/activities`;
    return this.post(url, { type: "message", ...request.content });
  }

  async createConversation(request: CreateConversationRequest): Promise<ChannelResponse> {
    const url = `${trimTrailingSlash(request.serviceUrl)}/v3/conversations`;
    return this.post(url, {
      isGroup: false,
      members: [{ id: request.userId }],
      ...(request.tenantId ? { tenantId: request.tenantId, channelData: { tenant: { id: request.tenantId } } } : {}),
    });
  }

  private async post(url: string, payload: Record<string, unknown>): Promise<ChannelResponse> {
    const timer = createTimer();
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const response = await this.fetchImpl(url, {
      method: "POST",
      headers,
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    const body = parseBody(await response.text());

    log.sender.debug({ url, status: response.status, duration: timer() }, "channel request");

    return {
      status: response.status,
      body,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    };
  }
}
