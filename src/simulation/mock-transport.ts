/**
 * In-process transport that replays scripted responses.
 *
 * Records every request it receives so tests can assert on URLs, headers and
 * bodies without any network access.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";

/**
 * A scripted reply. Object bodies are sent as JSON.
 */
export interface MockResponse {
  status?: number;
  headers?: Record<string, string>;
  body?: unknown;
}

export type MockReply = MockResponse | { error: Error };

function isErrorReply(reply: MockReply): reply is { error: Error } {
  return "error" in reply && reply.error instanceof Error;
}

function toResponse(reply: MockResponse): HttpResponse {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(reply.headers ?? {})) {
    headers[key.toLowerCase()] = value;
  }

  let body: Buffer;
  if (reply.body === undefined) {
    body = Buffer.alloc(0);
  } else if (typeof reply.body === "string") {
    body = Buffer.from(reply.body, "utf-8");
    headers["content-type"] ??= "text/plain";
  } else if (reply.body instanceof Uint8Array) {
    body = Buffer.from(reply.body);
    headers["content-type"] ??= "application/octet-stream";
  } else {
    body = Buffer.from(JSON.stringify(reply.body), "utf-8");
    headers["content-type"] ??= "application/json; charset=utf-8";
  }

  return { status: reply.status ?? 200, headers, body };
}

/**
 * Mock transport.
 *
 * @example
 * ```typescript
 * const transport = new MockTransport()
 *   .reply({ status: 503 })
 *   .reply({ body: { name: "-Nabc" } });
 * const http = new FirebaseHttpClient({ transport, sleep: async () => {} });
 * ```
 */
export class MockTransport implements HttpTransport {
  private readonly replies: MockReply[] = [];
  private readonly recorded: HttpRequest[] = [];

  /** Queues a reply. */
  reply(reply: MockReply): this {
    this.replies.push(reply);
    return this;
  }

  /** Queues a 200 JSON reply. */
  replyJson(body: unknown, status = 200, headers: Record<string, string> = {}): this {
    return this.reply({ status, headers: { "content-type": "application/json", ...headers }, body: JSON.stringify(body) });
  }

  /** Queues a transport-level failure. */
  fail(error: Error): this {
    return this.reply({ error });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recorded.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error(`MockTransport has no reply queued for ${request.method} ${request.url}`);
    }
    if (isErrorReply(reply)) {
      throw reply.error;
    }
    return toResponse(reply);
  }

  get requests(): readonly HttpRequest[] {
    return [...this.recorded];
  }

  /**
   * The most recent request.
   *
   * @throws {Error} If nothing has been sent yet
   */
  lastRequest(): HttpRequest {
    const last = this.recorded[this.recorded.length - 1];
    if (last === undefined) {
      throw new Error("MockTransport has not received any requests");
    }
    return last;
  }

  /** Replies not yet consumed. */
  pending(): number {
    return this.replies.length;
  }
}

/**
 * Request body parsed as JSON.
 */
export function jsonBody(request: HttpRequest): unknown {
  if (request.body === undefined) {
    return undefined;
  }
  const text = typeof request.body === "string" ? request.body : Buffer.from(request.body).toString("utf-8");
  return JSON.parse(text);
}

/**
 * Query parameters of a request URL.
 */
export function queryParams(request: HttpRequest): URLSearchParams {
  return new URL(request.url).searchParams;
}

/**
 * URL without its query string.
 */
export function urlPath(request: HttpRequest): string {
  const index = request.url.indexOf("?");
  return index === -1 ? request.url : request.url.slice(0, index);
}
