/**
 * Structured query builder for Firestore `runQuery`.
 *
 * Builders are immutable: every clause method returns a new builder, so a
 * partially built query can be reused as the base of several others.
 */

import { ValidationError } from "../errors/index.js";
import { basename, cleanPath, parentPath } from "../utils/paths.js";
import { encodeValue, type DocumentSnapshot, type WireValue } from "./codec.js";

/**
 * Comparison operators accepted by {@link FirestoreQuery.where}.
 */
export const WHERE_OPERATORS = {
  "==": "EQUAL",
  "!=": "NOT_EQUAL",
  "<": "LESS_THAN",
  "<=": "LESS_THAN_OR_EQUAL",
  ">": "GREATER_THAN",
  ">=": "GREATER_THAN_OR_EQUAL",
  "array-contains": "ARRAY_CONTAINS",
  "array-contains-any": "ARRAY_CONTAINS_ANY",
  in: "IN",
  "not-in": "NOT_IN",
} as const;

export type WhereOperator = keyof typeof WHERE_OPERATORS;
export type FieldOperator = (typeof WHERE_OPERATORS)[WhereOperator];
export type OrderDirection = "asc" | "desc";

/** Any string, while still suggesting the known literals. */
type LooseString = string & Record<never, never>;

export interface FieldFilter {
  fieldFilter: {
    field: { fieldPath: string };
    op: FieldOperator;
    value: WireValue;
  };
}

export interface CompositeFilter {
  compositeFilter: {
    op: "AND";
    filters: FieldFilter[];
  };
}

export interface Order {
  field: { fieldPath: string };
  direction: "ASCENDING" | "DESCENDING";
}

export interface StructuredQuery {
  from: Array<{ collectionId: string }>;
  where?: FieldFilter | CompositeFilter;
  orderBy?: Order[];
  limit?: number;
  offset?: number;
  select?: { fields: Array<{ fieldPath: string }> };
}

/**
 * Runs a compiled query. Supplied by the document service.
 */
export interface QueryExecutor {
  /**
   * @param parent - Document path the collection lives under; empty for top level
   */
  runQuery(parent: string, query: StructuredQuery): Promise<DocumentSnapshot[]>;
}

interface QueryState {
  readonly collectionPath: string;
  readonly filters: readonly FieldFilter[];
  readonly orders: readonly Order[];
  readonly limit?: number;
  readonly offset?: number;
  readonly fields?: readonly string[];
}

function isWhereOperator(op: string): op is WhereOperator {
  return Object.prototype.hasOwnProperty.call(WHERE_OPERATORS, op);
}

function requireCount(name: "limit" | "offset", value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`, { field: name });
  }
  return value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Immutable Firestore query.
 *
 * @example
 * ```typescript
 * const adults = await documents
 *   .query("users")
 *   .where("age", ">=", 18)
 *   .orderBy("name")
 *   .limit(10)
 *   .execute();
 * ```
 */
export class FirestoreQuery {
  private readonly state: QueryState;
  private readonly executor?: QueryExecutor;

  constructor(collectionPath: string, executor?: QueryExecutor, state?: Partial<Omit<QueryState, "collectionPath">>) {
    const path = cleanPath(collectionPath);
    if (path === "") {
      throw new ValidationError("Collection path must not be empty", { field: "collection" });
    }
    this.executor = executor;
    this.state = Object.freeze({
      filters: [],
      orders: [],
      ...state,
      collectionPath: path,
    });
  }

  get collectionPath(): string {
    return this.state.collectionPath;
  }

  /**
   * Adds a field filter. Filters are combined with AND.
   *
   * @throws {ValidationError} If the operator is not supported
   */
  where(field: string, op: WhereOperator | LooseString, value: unknown): FirestoreQuery {
    if (!isWhereOperator(op)) {
      throw new ValidationError(`Invalid operator: ${op}`, { field: "op" });
    }
    const filter: FieldFilter = {
      fieldFilter: {
        field: { fieldPath: field },
        op: WHERE_OPERATORS[op],
        value: encodeValue(value),
      },
    };
    return this.derive({ filters: [...this.state.filters, filter] });
  }

  /**
   * Adds a sort order. Direction is case-insensitive.
   *
   * @throws {ValidationError} If the direction is neither asc nor desc
   */
  orderBy(field: string, direction: OrderDirection | LooseString = "asc"): FirestoreQuery {
    const normalized = direction.toLowerCase();
    if (normalized !== "asc" && normalized !== "desc") {
      throw new ValidationError(`Direction must be 'asc' or 'desc', got '${direction}'`, {
        field: "direction",
      });
    }
    const order: Order = {
      field: { fieldPath: field },
      direction: normalized === "asc" ? "ASCENDING" : "DESCENDING",
    };
    return this.derive({ orders: [...this.state.orders, order] });
  }

  /** Maximum number of results; the last call wins. */
  limit(count: number): FirestoreQuery {
    return this.derive({ limit: requireCount("limit", count) });
  }

  /** Number of results to skip; the last call wins. */
  offset(count: number): FirestoreQuery {
    return this.derive({ offset: requireCount("offset", count) });
  }

  /**
   * Restricts the returned fields. Replaces any earlier projection;
   * no fields clears it.
   */
  select(...fields: string[]): FirestoreQuery {
    return this.derive({ fields: fields.length > 0 ? [...fields] : undefined });
  }

  /**
   * The `structuredQuery` payload, deep-frozen and sharing nothing with the builder.
   */
  compile(): StructuredQuery {
    const { collectionPath, filters, orders, limit, offset, fields } = this.state;
    const query: StructuredQuery = { from: [{ collectionId: basename(collectionPath) }] };

    const [first, ...rest] = filters;
    if (first !== undefined) {
      query.where = rest.length === 0 ? first : { compositeFilter: { op: "AND", filters: [...filters] } };
    }
    if (orders.length > 0) {
      query.orderBy = [...orders];
    }
    if (limit !== undefined) {
      query.limit = limit;
    }
    if (offset !== undefined) {
      query.offset = offset;
    }
    if (fields !== undefined) {
      query.select = { fields: fields.map((fieldPath) => ({ fieldPath })) };
    }
    return deepFreeze(structuredClone(query));
  }

  /**
   * Document path the collection belongs to; empty for a top-level collection.
   */
  parent(): string {
    return parentPath(this.state.collectionPath);
  }

  /**
   * Runs the query.
   *
   * @throws {ValidationError} If the query was built without an executor
   */
  async execute(): Promise<DocumentSnapshot[]> {
    if (this.executor === undefined) {
      throw new ValidationError("Query is not bound to a database; build it from DocumentService.query()");
    }
    return this.executor.runQuery(this.parent(), this.compile());
  }

  private derive(changes: Partial<Omit<QueryState, "collectionPath">>): FirestoreQuery {
    const { collectionPath, ...rest } = this.state;
    return new FirestoreQuery(collectionPath, this.executor, { ...rest, ...changes });
  }
}
