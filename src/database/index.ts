/**
 * Realtime Database Service.
 *
 * Reads and writes JSON trees over the Realtime Database REST API. The
 * connection's credential travels in the `auth` query parameter.
 */

import { writeFile } from "node:fs/promises";
import { z } from "zod";
import { ValidationError } from "../errors/index.js";
import { getConnectionToken, type Connection, type ServiceContext } from "../connection/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import type { FirebaseHttpClient, QueryValue, RequestOptions } from "../transport/http-client.js";
import { Bytes } from "../types/index.js";
import { cleanPath, combinePaths } from "../utils/paths.js";
import { DatabaseQuery, type DatabaseQueryExecutor } from "./query.js";

export { DatabaseQuery, type DatabaseKey, type DatabaseQueryExecutor } from "./query.js";

const PushResponseSchema = z.object({ name: z.string().min(1) });

const BytesEnvelopeSchema = z.object({ base64Set: z.string() });

export interface GetOptions {
  /** Return only the keys at the path, with children replaced by `true` */
  shallow?: boolean;
}

/**
 * Replaces {@link Bytes} anywhere in `value` with its `{ base64Set }` envelope.
 */
export function toDatabaseValue(value: unknown): unknown {
  if (value instanceof Bytes) {
    return { base64Set: value.toBase64() };
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toDatabaseValue(item));
  }
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toDatabaseValue(item);
    }
    return result;
  }
  return value;
}

/**
 * Realtime Database Service.
 *
 * @example
 * ```typescript
 * const database = new RealtimeDatabaseService({ connection, http });
 * const key = await database.push("messages", { text: "hello" });
 * const message = await database.get(key);
 * ```
 */
export class RealtimeDatabaseService implements DatabaseQueryExecutor {
  private readonly connection: Connection;
  private readonly http: FirebaseHttpClient;
  private readonly logger: Logger;

  constructor(context: ServiceContext) {
    this.connection = context.connection;
    this.http = context.http;
    this.logger = (context.logger ?? new NoopLogger()).child({ service: "database" });
  }

  /**
   * Reads the data at `path`. An empty location yields `null` and a warning.
   */
  async get(path: string, options: GetOptions = {}): Promise<unknown> {
    return this.readWithQuery(path, options.shallow ? { shallow: "true" } : {});
  }

  /**
   * Reads binary data stored with {@link set} as {@link Bytes}.
   *
   * @throws {ValidationError} If the location holds something else
   */
  async getBytes(path: string): Promise<Bytes | null> {
    const data = await this.get(path);
    if (data === null) {
      return null;
    }
    const envelope = BytesEnvelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new ValidationError(`Data at '${cleanPath(path)}' is not a binary value`, { field: "path" });
    }
    return Bytes.fromBase64(envelope.data.base64Set);
  }

  async readWithQuery(path: string, query: Record<string, QueryValue>): Promise<unknown> {
    const data = await this.http.request(await this.options({ method: "GET", url: this.url(path), query }));
    if (data === null) {
      this.logger.warn(`No data found at path: ${cleanPath(path) || "/"}`);
    }
    return data;
  }

  /**
   * Writes `data` at `path`, replacing what was there. Returns the path.
   */
  async set(path: string, data: unknown): Promise<string> {
    await this.http.request(
      await this.options({ method: "PUT", url: this.url(path), body: toDatabaseValue(data) })
    );
    return cleanPath(path);
  }

  /**
   * Appends `data` under a generated key. Returns the new child's path.
   */
  async push(path: string, data: unknown): Promise<string> {
    const response = await this.http.requestAs(
      await this.options({ method: "POST", url: this.url(path), body: toDatabaseValue(data) }),
      PushResponseSchema
    );
    return combinePaths(path, response.name);
  }

  /**
   * Merges the given children into the data at `path`. Returns the path.
   */
  async update(path: string, data: Record<string, unknown>): Promise<string> {
    await this.http.request(
      await this.options({ method: "PATCH", url: this.url(path), body: toDatabaseValue(data) })
    );
    return cleanPath(path);
  }

  async delete(path: string): Promise<string> {
    await this.http.request(await this.options({ method: "DELETE", url: this.url(path) }));
    return cleanPath(path);
  }

  query(path: string): DatabaseQuery {
    return new DatabaseQuery(path, this);
  }

  /**
   * Downloads the whole database as JSON into `fileName`. Requires a credential.
   */
  async backup(fileName: string): Promise<string> {
    const credential = await getConnectionToken(this.connection, this.http, { requireAuth: true });
    const text = await this.http.request({
      method: "GET",
      url: this.url(""),
      credential,
      responseType: "text",
    });
    await writeFile(fileName, typeof text === "string" ? text : "", "utf-8");
    this.logger.info(`Database backup written to ${fileName}`);
    return fileName;
  }

  /**
   * `<databaseUrl>/<path>.json`
   */
  url(path: string): string {
    const databaseUrl = this.connection.databaseUrl;
    if (databaseUrl === undefined) {
      throw new ValidationError("Realtime Database requires a database URL", { field: "databaseUrl" });
    }
    const cleaned = cleanPath(path);
    const encoded = cleaned === "" ? "" : cleaned.split("/").map(encodeURIComponent).join("/");
    return `${databaseUrl}/${encoded}.json`;
  }

  private async options(request: RequestOptions): Promise<RequestOptions> {
    const credential = await getConnectionToken(this.connection, this.http);
    return { ...request, credential, credentialMode: "query", credentialParam: "auth" };
  }
}
