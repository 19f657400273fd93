/**
 * Path and identifier helpers.
 */

import type { Logger } from "../observability/index.js";

/** Characters not allowed in Realtime Database keys. */
const INVALID_KEY_CHARS = /[$#[\]{}/.]/g;

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
const PROJECT_ID_PATTERN = /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/;

/**
 * Replaces `$ # [ ] { } / .` with `-`, logging a warning when anything changed.
 *
 * @example
 * ```typescript
 * sanitizePath("user.name@example.com"); // "user-name@example-com"
 * ```
 */
export function sanitizePath(path: string, logger?: Logger): string {
  const cleaned = path.replace(INVALID_KEY_CHARS, "-");
  if (cleaned !== path) {
    logger?.warn(`Path contained invalid characters and was sanitized: '${path}' -> '${cleaned}'`);
  }
  return cleaned;
}

/**
 * Strips leading and trailing slashes and collapses repeated ones.
 */
export function cleanPath(path: string): string {
  return path.replace(/\/{2,}/g, "/").replace(/^\/+|\/+$/g, "");
}

/**
 * Joins path segments with single slashes, ignoring empty segments.
 */
export function combinePaths(...segments: string[]): string {
  return segments
    .map(cleanPath)
    .filter((segment) => segment !== "")
    .join("/");
}

/**
 * Last segment of a slash-separated path.
 */
export function basename(path: string): string {
  const segments = cleanPath(path).split("/");
  return segments[segments.length - 1] ?? "";
}

/**
 * Everything but the last segment of a slash-separated path.
 */
export function parentPath(path: string): string {
  const segments = cleanPath(path).split("/");
  return segments.slice(0, -1).join("/");
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function isValidProjectId(projectId: string): boolean {
  return PROJECT_ID_PATTERN.test(projectId);
}

/**
 * Formats a byte count as B, KB, MB or GB with one decimal.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 ** 2) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  if (bytes < 1024 ** 3) {
    return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  }
  return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
}
