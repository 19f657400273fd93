/**
 * Tests for the error hierarchy and HTTP error mapping.
 */

import { describe, expect, it } from "vitest";
import {
  AuthError,
  FirebaseError,
  isFirebaseError,
  NetworkError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  ServiceError,
  ValidationError,
} from "../errors/index.js";
import { mapHttpError, parseErrorBody, parseRetryAfter } from "../transport/error-mapper.js";

describe("FirebaseError", () => {
  it("should keep the subclass in the prototype chain", () => {
    const error = new NotFoundError("missing", { code: "NOT_FOUND", status: 404 });
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toBeInstanceOf(FirebaseError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("NotFoundError");
    expect(error.kind).toBe("not_found");
  });

  it("should render as [code] message", () => {
    expect(new AuthError("bad token", { code: "INVALID_ID_TOKEN" }).toString()).toBe("[INVALID_ID_TOKEN] bad token");
    expect(new PermissionError("nope").toString()).toBe("nope");
  });

  it("should default validation errors to VALIDATION_ERROR", () => {
    const error = new ValidationError("Email is required", { field: "email" });
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.field).toBe("email");
    expect(error.retryable).toBe(false);
  });

  it("should mark network, rate-limit and 5xx errors retryable", () => {
    expect(new NetworkError("down").retryable).toBe(true);
    expect(new NetworkError("down").reason).toBe("ConnectionFailed");
    expect(new RateLimitError("slow down").retryable).toBe(true);
    expect(new ServiceError("boom", { status: 503 }).retryable).toBe(true);
    expect(new ServiceError("bad", { status: 400 }).retryable).toBe(false);
  });

  it("should keep the cause", () => {
    const cause = new Error("root");
    expect(new NetworkError("wrapped", "Timeout", { cause }).cause).toBe(cause);
  });

  it("should recognise package errors", () => {
    expect(isFirebaseError(new ServiceError("x"))).toBe(true);
    expect(isFirebaseError(new Error("x"))).toBe(false);
    expect(isFirebaseError("x")).toBe(false);
  });
});

describe("parseErrorBody", () => {
  it("should take the code from an Identity Toolkit message", () => {
    const body = JSON.stringify({
      error: { code: 400, message: "EMAIL_EXISTS", errors: [{ message: "EMAIL_EXISTS", reason: "invalid" }] },
    });
    expect(parseErrorBody(body)).toEqual({
      code: "EMAIL_EXISTS",
      message: "EMAIL_EXISTS",
      details: [{ message: "EMAIL_EXISTS", reason: "invalid" }],
    });
  });

  it("should take the code before a colon-separated explanation", () => {
    const body = JSON.stringify({
      error: { code: 400, message: "WEAK_PASSWORD : Password should be at least 6 characters" },
    });
    expect(parseErrorBody(body).code).toBe("WEAK_PASSWORD");
  });

  it("should fall back to the envelope status", () => {
    const body = JSON.stringify({
      error: { code: 404, message: "Document \"projects/demo-project/x\" not found.", status: "NOT_FOUND" },
    });
    expect(parseErrorBody(body)).toEqual({
      code: "NOT_FOUND",
      message: "Document \"projects/demo-project/x\" not found.",
      details: undefined,
    });
  });

  it("should read the Realtime Database envelope", () => {
    expect(parseErrorBody('{"error":"Permission denied"}')).toEqual({
      code: "UNKNOWN_ERROR",
      message: "Permission denied",
    });
  });

  it("should read the OAuth envelope", () => {
    const body = JSON.stringify({ error: "invalid_grant", error_description: "Invalid JWT Signature." });
    expect(parseErrorBody(body)).toEqual({ code: "invalid_grant", message: "Invalid JWT Signature." });
  });

  it("should return UNKNOWN_ERROR for bodies it cannot read", () => {
    expect(parseErrorBody("<html>Bad Gateway</html>")).toEqual({ code: "UNKNOWN_ERROR" });
    expect(parseErrorBody('{"unexpected":true}')).toEqual({ code: "UNKNOWN_ERROR" });
    expect(parseErrorBody("")).toEqual({ code: "UNKNOWN_ERROR" });
  });
});

describe("parseRetryAfter", () => {
  it("should read seconds case-insensitively", () => {
    expect(parseRetryAfter({ "Retry-After": "3" })).toBe(3);
    expect(parseRetryAfter({ "retry-after": "0" })).toBe(0);
  });

  it("should ignore HTTP dates and missing values", () => {
    expect(parseRetryAfter({ "retry-after": "Wed, 21 Oct 2015 07:28:00 GMT" })).toBeUndefined();
    expect(parseRetryAfter({})).toBeUndefined();
  });
});

describe("mapHttpError", () => {
  const envelope = (message: string, status?: string) => JSON.stringify({ error: { code: 400, message, status } });

  it("should map 401 to AuthError", () => {
    const error = mapHttpError(401, "");
    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe("HTTP 401 error");
    expect(error.code).toBe("UNKNOWN_ERROR");
    expect(error.status).toBe(401);
  });

  it("should map token codes to AuthError regardless of status", () => {
    expect(mapHttpError(400, envelope("INVALID_ID_TOKEN"))).toBeInstanceOf(AuthError);
    expect(mapHttpError(400, envelope("TOKEN_EXPIRED"))).toBeInstanceOf(AuthError);
  });

  it("should map user-management codes to AuthError", () => {
    const error = mapHttpError(400, envelope("EMAIL_EXISTS"));
    expect(error).toBeInstanceOf(AuthError);
    expect(error.code).toBe("EMAIL_EXISTS");
  });

  it("should map 403 and PERMISSION_DENIED to PermissionError", () => {
    expect(mapHttpError(403, '{"error":"Permission denied"}')).toBeInstanceOf(PermissionError);
    expect(mapHttpError(400, envelope("Missing or insufficient permissions.", "PERMISSION_DENIED"))).toBeInstanceOf(
      PermissionError
    );
  });

  it("should map 404 to NotFoundError", () => {
    expect(mapHttpError(404, envelope("Not found", "NOT_FOUND"))).toBeInstanceOf(NotFoundError);
  });

  it("should map 429 to RateLimitError with Retry-After", () => {
    const error = mapHttpError(429, "", { "retry-after": "7" });
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfter).toBe(7);
  });

  it("should map everything else to ServiceError", () => {
    const serverError = mapHttpError(500, envelope("Internal error", "INTERNAL"));
    expect(serverError).toBeInstanceOf(ServiceError);
    expect(serverError.code).toBe("INTERNAL");
    expect(serverError.retryable).toBe(true);

    const badRequest = mapHttpError(400, envelope("Invalid argument", "INVALID_ARGUMENT"));
    expect(badRequest).toBeInstanceOf(ServiceError);
    expect(badRequest.retryable).toBe(false);
  });
});
