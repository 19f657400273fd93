/**
 * Retrying HTTP client shared by every service.
 *
 * Builds the request (credential placement, body encoding, query string),
 * sends it through the configured {@link HttpTransport}, retries transient
 * failures with exponential backoff and translates failures into the error
 * hierarchy.
 */

import type { z } from "zod";
import { NetworkError, ServiceError, ValidationError } from "../errors/index.js";
import { resolveHttpClientConfig, type HttpClientConfig } from "../config/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { calculateBackoff } from "./backoff.js";
import { mapHttpError, parseRetryAfter, RETRYABLE_STATUSES } from "./error-mapper.js";
import {
  FetchTransport,
  getHeader,
  isSuccess,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./index.js";

/** Credential value that means "send no credential". */
export const NO_CREDENTIAL = "none";

export type CredentialMode = "query" | "bearer";
export type BodyEncoding = "json" | "form" | "raw";
export type ResponseType = "auto" | "text" | "bytes";

export type QueryValue = string | number | boolean | undefined | readonly string[];

/**
 * Options for a single logical request.
 */
export interface RequestOptions {
  method: HttpMethod;
  url: string;
  /** Structured bodies are encoded per `encode`; strings and bytes pass through */
  body?: unknown;
  encode?: BodyEncoding;
  headers?: Record<string, string>;
  /** Appended to the URL; arrays become repeated parameters */
  query?: Record<string, QueryValue>;
  credential?: string | null;
  credentialMode?: CredentialMode;
  /** Query parameter name used in `query` mode (default `auth`) */
  credentialParam?: string;
  maxRetries?: number;
  /** Seconds */
  baseDelay?: number;
  timeoutSeconds?: number;
  responseType?: ResponseType;
}

export interface FirebaseHttpClientOptions {
  transport?: HttpTransport;
  logger?: Logger;
  config?: Partial<HttpClientConfig>;
  /** Awaited between attempts; receives seconds */
  sleep?: (seconds: number) => Promise<void>;
  /** Source of jitter in [0, 1) */
  random?: () => number;
}

/**
 * Sleeps for the given number of seconds.
 */
export function sleepSeconds(seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

/**
 * HTTP client with retry and error translation.
 *
 * @example
 * ```typescript
 * const http = new FirebaseHttpClient({ logger: new ConsoleLogger() });
 * const data = await http.request({
 *   method: "GET",
 *   url: "https://demo-project-default-rtdb.firebaseio.com/users.json",
 *   credential: idToken,
 * });
 * ```
 */
export class FirebaseHttpClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly config: HttpClientConfig;
  private readonly sleep: (seconds: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: FirebaseHttpClientOptions = {}) {
    this.config = resolveHttpClientConfig(options.config);
    this.transport = options.transport ?? new FetchTransport(this.config.timeoutSeconds * 1000);
    this.logger = options.logger ?? new NoopLogger();
    this.sleep = options.sleep ?? sleepSeconds;
    this.random = options.random ?? Math.random;
  }

  /**
   * Performs the request and returns the decoded response body.
   *
   * @throws {NetworkError} When the transport keeps failing past the retry budget
   * @throws {FirebaseError} The decoded service error for a failed response
   */
  async request(options: RequestOptions): Promise<unknown> {
    const request = this.buildRequest(options);
    const response = await this.attempt(request, options, 1);
    return decodeResponse(response, options.responseType ?? "auto");
  }

  /**
   * Performs the request and validates the decoded body against `schema`.
   *
   * @throws {ServiceError} If the body does not match the expected shape
   */
  async requestAs<T>(options: RequestOptions, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = await this.request(options);
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ServiceError(`Unexpected response from ${options.method} ${stripQuery(options.url)}`, {
        code: "INVALID_RESPONSE",
        details: result.error.issues,
      });
    }
    return result.data;
  }

  /**
   * Builds the transport-level request.
   */
  buildRequest(options: RequestOptions): HttpRequest {
    const query: Record<string, QueryValue> = { ...options.query };
    const headers: Record<string, string> = { ...options.headers };

    const credential = options.credential;
    if (credential !== undefined && credential !== null && credential !== "" && credential !== NO_CREDENTIAL) {
      if ((options.credentialMode ?? "query") === "bearer") {
        headers["Authorization"] = `Bearer ${credential}`;
      } else {
        query[options.credentialParam ?? "auth"] = credential;
      }
    }

    const body = encodeBody(options.body, options.encode ?? "json", headers);
    const timeoutSeconds = options.timeoutSeconds ?? this.config.timeoutSeconds;

    return {
      method: options.method,
      url: appendQuery(options.url, query),
      headers,
      body,
      timeout: timeoutSeconds * 1000,
    };
  }

  private async attempt(request: HttpRequest, options: RequestOptions, attempt: number): Promise<HttpResponse> {
    const maxRetries = options.maxRetries ?? this.config.maxRetries;
    const baseDelay = options.baseDelay ?? this.config.baseDelay;

    let response: HttpResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      const networkError =
        error instanceof NetworkError
          ? error
          : new NetworkError(error instanceof Error ? error.message : String(error), "ConnectionFailed", {
              cause: error,
            });
      if (attempt > maxRetries) {
        throw networkError;
      }
      const delay = calculateBackoff(attempt, baseDelay, this.config.maxDelay, this.random);
      this.logger.warn(`Network error: ${networkError.message}. Retrying in ${delay.toFixed(1)} seconds...`, {
        attempt,
        method: request.method,
      });
      await this.sleep(delay);
      return this.attempt(request, options, attempt + 1);
    }

    if (isSuccess(response.status)) {
      return response;
    }

    if (RETRYABLE_STATUSES.has(response.status) && attempt <= maxRetries) {
      const delay =
        parseRetryAfter(response.headers) ??
        calculateBackoff(attempt, baseDelay, this.config.maxDelay, this.random);
      this.logger.warn(
        `Request failed with status ${response.status}. Retrying in ${delay.toFixed(1)} seconds...`,
        { attempt, status: response.status, method: request.method }
      );
      await this.sleep(delay);
      return this.attempt(request, options, attempt + 1);
    }

    throw mapHttpError(response.status, response.body.toString("utf-8"), response.headers);
  }
}

function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

/**
 * Encodes the request body and sets a matching content type unless one is given.
 */
export function encodeBody(
  body: unknown,
  encode: BodyEncoding,
  headers: Record<string, string>
): string | Uint8Array | undefined {
  if (body === undefined) {
    return undefined;
  }
  if (typeof body === "string" || isBytes(body)) {
    return body;
  }

  switch (encode) {
    case "json":
      setDefaultHeader(headers, "Content-Type", "application/json");
      return JSON.stringify(body);
    case "form": {
      if (typeof body !== "object" || body === null) {
        throw new ValidationError("Form bodies must be objects", { field: "body" });
      }
      setDefaultHeader(headers, "Content-Type", "application/x-www-form-urlencoded");
      const form = new URLSearchParams();
      for (const [key, value] of Object.entries(body)) {
        if (value !== undefined && value !== null) {
          form.append(key, String(value));
        }
      }
      return form.toString();
    }
    case "raw":
      throw new ValidationError("Raw bodies must be strings or byte arrays", { field: "body" });
  }
}

function setDefaultHeader(headers: Record<string, string>, name: string, value: string): void {
  if (getHeader(headers, name) === undefined) {
    headers[name] = value;
  }
}

/**
 * Appends query parameters to a URL, keeping any already present.
 */
export function appendQuery(url: string, query: Record<string, QueryValue>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === "object") {
      for (const item of value) {
        params.append(key, item);
      }
    } else {
      params.append(key, String(value));
    }
  }
  const queryString = params.toString();
  if (queryString === "") {
    return url;
  }
  return `${url}${url.includes("?") ? "&" : "?"}${queryString}`;
}

/**
 * Decodes a successful response body.
 *
 * @throws {ServiceError} If a JSON body cannot be parsed
 */
export function decodeResponse(response: HttpResponse, responseType: ResponseType): unknown {
  if (responseType === "bytes") {
    return response.body;
  }
  const text = response.body.toString("utf-8");
  if (responseType === "text") {
    return text;
  }
  const contentType = getHeader(response.headers, "content-type") ?? "";
  if (contentType.toLowerCase().includes("json")) {
    if (text.trim() === "") {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ServiceError(`Malformed JSON response with status ${response.status}`, {
        code: "INVALID_RESPONSE",
        status: response.status,
        cause: error,
      });
    }
  }
  return text;
}

function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}
