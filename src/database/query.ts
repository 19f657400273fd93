/**
 * Realtime Database query parameters (`orderBy`, `limitToFirst`, ...).
 */

import { ValidationError } from "../errors/index.js";
import type { QueryValue } from "../transport/http-client.js";

export type DatabaseKey = string | number | boolean | null;

/**
 * Reads the data at a path with the given query parameters.
 */
export interface DatabaseQueryExecutor {
  readWithQuery(path: string, query: Record<string, QueryValue>): Promise<unknown>;
}

interface DatabaseQueryState {
  readonly orderBy?: string;
  readonly limitToFirst?: number;
  readonly limitToLast?: number;
  readonly startAt?: DatabaseKey;
  readonly endAt?: DatabaseKey;
  readonly equalTo?: DatabaseKey;
}

function requireLimit(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, { field: name });
  }
  return value;
}

/**
 * Immutable Realtime Database query.
 *
 * @example
 * ```typescript
 * const topScores = await database
 *   .query("scores")
 *   .orderBy("$value")
 *   .limitToLast(3)
 *   .execute();
 * ```
 */
export class DatabaseQuery {
  private readonly path: string;
  private readonly executor: DatabaseQueryExecutor;
  private readonly state: DatabaseQueryState;

  constructor(path: string, executor: DatabaseQueryExecutor, state: DatabaseQueryState = {}) {
    this.path = path;
    this.executor = executor;
    this.state = Object.freeze({ ...state });
  }

  /**
   * Orders by a child key, or by `$key`, `$value` or `$priority`. Range and
   * limit filters can only follow it.
   */
  orderBy(child: string): DatabaseQuery {
    if (child === "") {
      throw new ValidationError("orderBy requires a child key", { field: "orderBy" });
    }
    return this.derive({ orderBy: child });
  }

  limitToFirst(count: number): DatabaseQuery {
    this.requireOrderBy("limitToFirst");
    return this.derive({ limitToFirst: requireLimit("limitToFirst", count) });
  }

  limitToLast(count: number): DatabaseQuery {
    this.requireOrderBy("limitToLast");
    return this.derive({ limitToLast: requireLimit("limitToLast", count) });
  }

  startAt(value: DatabaseKey): DatabaseQuery {
    this.requireOrderBy("startAt");
    return this.derive({ startAt: value });
  }

  endAt(value: DatabaseKey): DatabaseQuery {
    this.requireOrderBy("endAt");
    return this.derive({ endAt: value });
  }

  equalTo(value: DatabaseKey): DatabaseQuery {
    this.requireOrderBy("equalTo");
    return this.derive({ equalTo: value });
  }

  /**
   * Query-string parameters. Keys and values are JSON-encoded, so strings
   * are sent quoted.
   *
   * @throws {ValidationError} If a range or limit is set without `orderBy`
   */
  toParams(): Record<string, string> {
    const { orderBy, limitToFirst, limitToLast, startAt, endAt, equalTo } = this.state;
    const constrained =
      limitToFirst !== undefined ||
      limitToLast !== undefined ||
      startAt !== undefined ||
      endAt !== undefined ||
      equalTo !== undefined;
    if (constrained && orderBy === undefined) {
      throw new ValidationError("Range and limit filters require orderBy", { field: "orderBy" });
    }

    const params: Record<string, string> = {};
    if (orderBy !== undefined) params["orderBy"] = JSON.stringify(orderBy);
    if (limitToFirst !== undefined) params["limitToFirst"] = String(limitToFirst);
    if (limitToLast !== undefined) params["limitToLast"] = String(limitToLast);
    if (startAt !== undefined) params["startAt"] = JSON.stringify(startAt);
    if (endAt !== undefined) params["endAt"] = JSON.stringify(endAt);
    if (equalTo !== undefined) params["equalTo"] = JSON.stringify(equalTo);
    return params;
  }

  async execute(): Promise<unknown> {
    return this.executor.readWithQuery(this.path, this.toParams());
  }

  private requireOrderBy(filter: string): void {
    if (this.state.orderBy === undefined) {
      throw new ValidationError(`${filter} requires orderBy to be set first`, { field: "orderBy" });
    }
  }

  private derive(changes: DatabaseQueryState): DatabaseQuery {
    return new DatabaseQuery(this.path, this.executor, { ...this.state, ...changes });
  }
}
