/**
 * HTTP Error Mapper
 *
 * Decodes the error envelopes returned by the Firebase REST services and maps
 * them onto the error hierarchy in `../errors`.
 */

import { z } from "zod";
import {
  AuthError,
  FirebaseError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  ServiceError,
} from "../errors/index.js";
import { getHeader } from "./index.js";

/** HTTP statuses that are retried by the request loop. */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** Codes meaning the presented credential is expired or invalid. */
const TOKEN_CODES = new Set([
  "INVALID_ID_TOKEN",
  "TOKEN_EXPIRED",
  "INVALID_REFRESH_TOKEN",
  "USER_NOT_FOUND",
  "UNAUTHENTICATED",
]);

/** Identity Toolkit user-management codes. */
const USER_MANAGEMENT_CODES = new Set([
  "INVALID_EMAIL",
  "INVALID_PASSWORD",
  "EMAIL_NOT_FOUND",
  "USER_DISABLED",
  "EMAIL_EXISTS",
  "WEAK_PASSWORD",
  "OPERATION_NOT_ALLOWED",
  "TOO_MANY_ATTEMPTS_TRY_LATER",
  "INVALID_LOGIN_CREDENTIALS",
]);

/**
 * Google API error envelope: `{ error: { code, message, status, errors, details } }`.
 */
const GoogleErrorEnvelopeSchema = z.object({
  error: z
    .object({
      code: z.union([z.number(), z.string()]).optional(),
      message: z.string().optional(),
      status: z.string().optional(),
      errors: z.array(z.unknown()).optional(),
      details: z.array(z.unknown()).optional(),
    })
    .passthrough(),
});

/**
 * Realtime Database (`{ error: "Permission denied" }`) and OAuth
 * (`{ error: "invalid_grant", error_description: "..." }`) envelopes.
 */
const PlainErrorEnvelopeSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Normalized error information extracted from a response body.
 */
export interface ErrorInfo {
  code: string;
  message?: string;
  details?: unknown;
}

/**
 * Extracts code, message and details from an error body.
 * Bodies that are not JSON or match no known envelope yield `UNKNOWN_ERROR`.
 */
export function parseErrorBody(body: string): ErrorInfo {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { code: "UNKNOWN_ERROR" };
  }

  const google = GoogleErrorEnvelopeSchema.safeParse(json);
  if (google.success) {
    const { code, message, status, errors, details } = google.data.error;
    return {
      code:
        leadingCode(message) ??
        status ??
        (typeof code === "string" ? code : undefined) ??
        "UNKNOWN_ERROR",
      message,
      details: errors ?? details,
    };
  }

  const plain = PlainErrorEnvelopeSchema.safeParse(json);
  if (plain.success) {
    const { error, error_description: description } = plain.data;
    if (description !== undefined) {
      return { code: error, message: description };
    }
    return { code: leadingCode(error) ?? "UNKNOWN_ERROR", message: error };
  }

  return { code: "UNKNOWN_ERROR" };
}

/**
 * Identity Toolkit messages start with the code, e.g.
 * `"WEAK_PASSWORD : Password should be at least 6 characters"`.
 */
function leadingCode(message: string | undefined): string | undefined {
  const match = message ? /^([A-Z][A-Z0-9_]+)(?:\s*:.*)?$/s.exec(message) : null;
  return match?.[1];
}

/**
 * Parses a `Retry-After` header given in seconds.
 * HTTP-date values are not supported and yield `undefined`.
 */
export function parseRetryAfter(headers: Record<string, string>): number | undefined {
  const value = getHeader(headers, "retry-after");
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Map an HTTP error response to a {@link FirebaseError}.
 */
export function mapHttpError(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): FirebaseError {
  const info = parseErrorBody(body);
  const message = info.message ?? `HTTP ${status} error`;
  const options = { code: info.code, status, details: info.details };

  if (status === 401 || TOKEN_CODES.has(info.code)) {
    return new AuthError(message, options);
  }
  if (status === 403 || info.code === "PERMISSION_DENIED") {
    return new PermissionError(message, options);
  }
  if (status === 404) {
    return new NotFoundError(message, options);
  }
  if (status === 429) {
    return new RateLimitError(message, { ...options, retryAfter: parseRetryAfter(headers) });
  }
  if (USER_MANAGEMENT_CODES.has(info.code)) {
    return new AuthError(message, options);
  }
  return new ServiceError(message, options);
}
