import { describe, it, expect, vi } from "vitest";
import { describeChannelError, HttpChannelClient, parseRetryAfter } from "../../../channel/channel-client.js";

describe("parseRetryAfter", () => {
  it("should parse delta-seconds", () => {
    expect(parseRetryAfter("2")).toBe(2000);
    expect(parseRetryAfter("1.5")).toBe(1500);
  });

  it("should clamp negative values to 0", () => {
    expect(parseRetryAfter("-3")).toBe(0);
  });

  it("should parse an HTTP date relative to now", () => {
    const now = Date.parse("Wed, 21 Oct 2015 07:28:00 GMT") - 5000;
    expect(parseRetryAfter("Wed, 21 Oct 2015 07:28:00 GMT", now)).toBe(5000);
  });

  it("should ignore missing or unreadable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter(" ")).toBeUndefined();
    expect(parseRetryAfter("later")).toBeUndefined();
  });
});

describe("describeChannelError", () => {
  it("should prefer the error message from the body", () => {
    expect(describeChannelError({ status: 403, body: { error: { message: "Forbidden" } } })).toBe("HTTP 403: Forbidden");
  });

  it("should fall back to the raw body", () => {
    expect(describeChannelError({ status: 503, body: "Too busy" })).toBe("HTTP 503: Too busy");
    expect(describeChannelError({ status: 400, body: { reason: "bad" } })).toBe('HTTP 400: {"reason":"bad"}');
  });

  it("should omit an empty body", () => {
    expect(describeChannelError({ status: 500, body: "" })).toBe("HTTP 500");
    expect(describeChannelError({ status: 502, body: null })).toBe("HTTP 502");
  });

  it("should truncate long bodies to 200 characters", () => {
    const message = describeChannelError({ status: 500, body: "x".repeat(500) });
    expect(message).toBe(`HTTP 500: ${"x".repeat(200)}`);
  });
});

describe("HttpChannelClient", () => {
  function clientWith(response: Response, token = "test-secret") {
    const fetchImpl = vi.fn<typeof fetch>(async () => response);
    return { client: new HttpChannelClient({ token, timeoutMs: 1000, fetchImpl }), fetchImpl };
  }

  it("should post a message activity to the conversation", async () => {
    const { client, fetchImpl } = clientWith(new Response(JSON.stringify({ id: "act-1" }), { status: 201 }));

    const response = await client.sendMessage({
      serviceUrl: "https://channel.test/",
      conversationId: "conv 1",
      content: { text: "Hello" },
    });

    expect(response).toEqual({ status: 201, body: { id: "act-1" }, retryAfterMs: undefined });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://channel.test/v3/conversations/conv%201/activities");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({ type: "message", text: "Hello" });
  });

  it("should create a conversation with the tenant when given", async () => {
    const { client, fetchImpl } = clientWith(new Response(JSON.stringify({ id: "conv-new" }), { status: 201 }));

    await client.createConversation({ serviceUrl: "https://channel.test", userId: "user-1", tenantId: "tenant-1" });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://channel.test/v3/conversations");
    expect(JSON.parse(String(init?.body))).toEqual({
      isGroup: false,
      members: [{ id: "user-1" }],
      tenantId: "tenant-1",
      channelData: { tenant: { id: "tenant-1" } },
    });
  });

  it("should leave out the tenant when absent", async () => {
    const { client, fetchImpl } = clientWith(new Response("", { status: 201 }));

    await client.createConversation({ serviceUrl: "https://channel.test", userId: "user-1" });

    const [, init] = fetchImpl.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({ isGroup: false, members: [{ id: "user-1" }] });
  });

  it("should read Retry-After and keep a non-JSON body as text", async () => {
    const { client } = clientWith(new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }));

    const response = await client.sendMessage({
      serviceUrl: "https://channel.test",
      conversationId: "conv-1",
      content: { text: "Hello" },
    });

    expect(response).toEqual({ status: 429, body: "slow down", retryAfterMs: 2000 });
  });

  it("should send no Authorization header without a token", async () => {
    const { client, fetchImpl } = clientWith(new Response("", { status: 201 }), "");

    await client.sendMessage({ serviceUrl: "https://channel.test", conversationId: "conv-1", content: {} });

    const [, init] = fetchImpl.mock.calls[0];
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
  });
});
