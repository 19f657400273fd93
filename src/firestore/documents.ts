/**
 * Document Service for Cloud Firestore.
 *
 * CRUD, listing and structured queries over the Firestore REST API. Requests
 * carry the connection's credential as a bearer token.
 */

import { z } from "zod";
import { NotFoundError, ValidationError } from "../errors/index.js";
import { getConnectionToken, type Connection, type ServiceContext } from "../connection/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import type { FirebaseHttpClient, RequestOptions } from "../transport/http-client.js";
import { cleanPath } from "../utils/paths.js";
import {
  encodeFields,
  FirestoreDocumentSchema,
  parseDocument,
  type DocumentSnapshot,
} from "./codec.js";
import { FirestoreQuery, type QueryExecutor, type StructuredQuery } from "./query.js";

export const DEFAULT_PAGE_SIZE = 100;

const ListDocumentsResponseSchema = z
  .object({
    documents: z.array(FirestoreDocumentSchema).optional(),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

const RunQueryResponseSchema = z
  .array(
    z
      .object({
        document: FirestoreDocumentSchema.optional(),
        readTime: z.string().optional(),
        skippedResults: z.number().optional(),
      })
      .passthrough()
  )
  .nullable();

export interface ListDocumentsOptions {
  pageSize?: number;
  pageToken?: string;
  /** e.g. `"name desc"` */
  orderBy?: string;
}

export interface DocumentPage {
  documents: DocumentSnapshot[];
  nextPageToken?: string;
}

/**
 * Encodes each segment of a slash-separated path.
 */
function encodePath(path: string): string {
  return cleanPath(path)
    .split("/")
    .filter((segment) => segment !== "")
    .map(encodeURIComponent)
    .join("/");
}

/**
 * Document Service.
 *
 * @example
 * ```typescript
 * const documents = new DocumentService({ connection, http });
 * await documents.set("users", "alice", { name: "Alice", age: 31 });
 * const alice = await documents.get("users", "alice");
 * ```
 */
export class DocumentService implements QueryExecutor {
  private readonly connection: Connection;
  private readonly http: FirebaseHttpClient;
  private readonly logger: Logger;

  constructor(context: ServiceContext) {
    this.connection = context.connection;
    this.http = context.http;
    this.logger = (context.logger ?? new NoopLogger()).child({ service: "firestore" });
  }

  /**
   * Fetches a document. A missing document yields `null` and a warning.
   */
  async get(collection: string, documentId: string): Promise<DocumentSnapshot | null> {
    try {
      const document = await this.http.requestAs(
        await this.options({ method: "GET", url: this.documentUrl(collection, documentId) }),
        FirestoreDocumentSchema
      );
      return parseDocument(document);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn(`Document not found: ${collection}/${documentId}`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Creates or overwrites a document.
   */
  async set(collection: string, documentId: string, data: Record<string, unknown>): Promise<DocumentSnapshot> {
    const document = await this.http.requestAs(
      await this.options({
        method: "PATCH",
        url: this.documentUrl(collection, documentId),
        body: { fields: encodeFields(data) },
      }),
      FirestoreDocumentSchema
    );
    return parseDocument(document);
  }

  /**
   * Creates a document with a server-generated id.
   */
  async add(collection: string, data: Record<string, unknown>): Promise<DocumentSnapshot> {
    const document = await this.http.requestAs(
      await this.options({
        method: "POST",
        url: this.collectionUrl(collection),
        body: { fields: encodeFields(data) },
      }),
      FirestoreDocumentSchema
    );
    return parseDocument(document);
  }

  /**
   * Updates only the given top-level fields, leaving the rest untouched.
   */
  async update(collection: string, documentId: string, data: Record<string, unknown>): Promise<DocumentSnapshot> {
    const fields = encodeFields(data);
    const document = await this.http.requestAs(
      await this.options({
        method: "PATCH",
        url: this.documentUrl(collection, documentId),
        query: { "updateMask.fieldPaths": Object.keys(fields) },
        body: { fields },
      }),
      FirestoreDocumentSchema
    );
    return parseDocument(document);
  }

  async delete(collection: string, documentId: string): Promise<true> {
    await this.http.request(
      await this.options({ method: "DELETE", url: this.documentUrl(collection, documentId) })
    );
    return true;
  }

  /**
   * Lists one page of a collection.
   */
  async list(collection: string, options: ListDocumentsOptions = {}): Promise<DocumentPage> {
    const response = await this.http.requestAs(
      await this.options({
        method: "GET",
        url: this.collectionUrl(collection),
        query: {
          pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
          pageToken: options.pageToken,
          orderBy: options.orderBy,
        },
      }),
      ListDocumentsResponseSchema
    );
    return {
      documents: (response.documents ?? []).map(parseDocument),
      nextPageToken: response.nextPageToken,
    };
  }

  /**
   * Starts a query over the collection at `collectionPath`
   * (which may be nested, e.g. `users/alice/posts`).
   */
  query(collectionPath: string): FirestoreQuery {
    return new FirestoreQuery(collectionPath, this);
  }

  async runQuery(parent: string, structuredQuery: StructuredQuery): Promise<DocumentSnapshot[]> {
    const parentSegment = parent === "" ? "" : `/${encodePath(parent)}`;
    const response = await this.http.requestAs(
      await this.options({
        method: "POST",
        url: `${this.documentsRoot()}${parentSegment}:runQuery`,
        body: { structuredQuery },
      }),
      RunQueryResponseSchema
    );
    const results: DocumentSnapshot[] = [];
    for (const row of response ?? []) {
      if (row.document !== undefined) {
        results.push(parseDocument(row.document));
      }
    }
    return results;
  }

  /**
   * `<firestore>/projects/<projectId>/databases/<databaseId>/documents`
   *
   * @throws {ValidationError} If the connection has no project id
   */
  documentsRoot(): string {
    const { projectId, databaseId, endpoints } = this.connection;
    if (projectId === undefined) {
      throw new ValidationError("Firestore requires a project id", { field: "projectId" });
    }
    return `${endpoints.firestore}/projects/${encodeURIComponent(projectId)}/databases/${encodeURIComponent(databaseId)}/documents`;
  }

  private collectionUrl(collection: string): string {
    return `${this.documentsRoot()}/${this.requirePath(collection, "collection")}`;
  }

  private documentUrl(collection: string, documentId: string): string {
    return `${this.collectionUrl(collection)}/${this.requirePath(documentId, "documentId")}`;
  }

  private requirePath(path: string, field: string): string {
    const encoded = encodePath(path);
    if (encoded === "") {
      throw new ValidationError(`${field} must not be empty`, { field });
    }
    return encoded;
  }

  private async options(request: RequestOptions): Promise<RequestOptions> {
    const credential = await getConnectionToken(this.connection, this.http);
    return { ...request, credential, credentialMode: "bearer" };
  }
}
