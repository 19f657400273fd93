/**
 * HTTP Transport Layer
 *
 * The {@link HttpTransport} interface is the only place this package performs
 * network I/O. {@link FetchTransport} is the default implementation; tests and
 * emulator setups substitute their own.
 */

import { NetworkError, type NetworkFailureReason } from "../errors/index.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * HTTP response. Header names are lower-case.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request. Rejects with {@link NetworkError} when no response
   * was received; any HTTP status resolves.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Check if HTTP status indicates success.
 */
export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultTimeout: number;

  /**
   * @param defaultTimeout - Timeout in milliseconds when the request sets none (default: 120000)
   */
  constructor(defaultTimeout: number = 120_000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(timeout),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: Buffer.from(await response.arrayBuffer()),
      };
    } catch (error) {
      throw toNetworkError(error, timeout);
    }
  }
}

/**
 * Classifies a fetch failure. Node's fetch reports socket errors as a
 * `TypeError("fetch failed")` whose `cause` carries the system error code.
 */
export function toNetworkError(error: unknown, timeout: number): NetworkError {
  if (!(error instanceof Error)) {
    return new NetworkError(String(error), "ConnectionFailed");
  }
  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return new NetworkError(`Request timeout after ${timeout}ms`, "Timeout", { cause: error });
  }

  const detail = `${error.message} ${describeCause(error.cause)}`;
  const reason = classifyFailure(detail);
  return new NetworkError(`${failurePrefix(reason)}${detail.trim()}`, reason, { cause: error });
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : "";
    return `${code} ${cause.message}`.trim();
  }
  return "";
}

function classifyFailure(detail: string): NetworkFailureReason {
  if (/ETIMEDOUT|UND_ERR_CONNECT_TIMEOUT/.test(detail)) return "Timeout";
  if (/ENOTFOUND|EAI_AGAIN|DNS/.test(detail)) return "DnsResolutionFailed";
  if (/TLS|SSL|CERT/.test(detail)) return "TlsError";
  return "ConnectionFailed";
}

function failurePrefix(reason: NetworkFailureReason): string {
  switch (reason) {
    case "Timeout":
      return "Request timed out: ";
    case "DnsResolutionFailed":
      return "DNS resolution failed: ";
    case "TlsError":
      return "TLS error: ";
    case "ConnectionFailed":
      return "Connection failed: ";
  }
}
