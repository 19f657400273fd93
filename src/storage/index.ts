/**
 * Storage Service.
 *
 * Uploads, downloads and manages objects in the project's Cloud Storage
 * bucket. Every call needs a credential, sent as a bearer token.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, writeFile } from "node:fs/promises";
import { basename as fileBasename, join } from "node:path";
import { z } from "zod";
import { NotFoundError, ValidationError } from "../errors/index.js";
import { getConnectionToken, type Connection, type ServiceContext } from "../connection/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import type { FirebaseHttpClient, RequestOptions } from "../transport/http-client.js";
import { combinePaths, formatBytes } from "../utils/paths.js";

export const DEFAULT_MAX_RESULTS = 1000;

const ObjectMetadataSchema = z
  .object({
    name: z.string(),
    bucket: z.string(),
    size: z.string().optional(),
    contentType: z.string().optional(),
    timeCreated: z.string().optional(),
    updated: z.string().optional(),
    md5Hash: z.string().optional(),
    mediaLink: z.string().optional(),
    metadata: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

export type ObjectMetadata = z.infer<typeof ObjectMetadataSchema>;

const ListObjectsResponseSchema = z
  .object({
    items: z.array(ObjectMetadataSchema).optional(),
    prefixes: z.array(z.string()).optional(),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

export type ListObjectsResponse = z.infer<typeof ListObjectsResponseSchema>;

export type UploadResult = ObjectMetadata & { url: string };

export type PredefinedAcl =
  | "authenticatedRead"
  | "bucketOwnerFullControl"
  | "bucketOwnerRead"
  | "private"
  | "projectPrivate"
  | "publicRead";

export interface UploadOptions {
  /** Defaults to a type guessed from the object name */
  contentType?: string;
  predefinedAcl?: PredefinedAcl;
}

export interface ListObjectsOptions {
  prefix?: string;
  delimiter?: string;
  maxResults?: number;
  pageToken?: string;
}

const CONTENT_TYPES: Record<string, string> = {
  ".json": "application/json",
  ".txt": "text/plain",
  ".csv": "text/csv",
  ".html": "text/html",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".pdf": "application/pdf",
};

/**
 * Content type inferred from a file extension.
 */
export function guessContentType(name: string): string {
  const dot = name.lastIndexOf(".");
  const extension = dot === -1 ? "" : name.slice(dot).toLowerCase();
  return CONTENT_TYPES[extension] ?? "application/octet-stream";
}

/**
 * Storage Service.
 *
 * @example
 * ```typescript
 * const storage = new StorageService({ connection, http });
 * const uploaded = await storage.uploadFile("./report.pdf", "reports/2024.pdf");
 * const link = await storage.getDownloadUrl("reports/2024.pdf");
 * ```
 */
export class StorageService {
  private readonly connection: Connection;
  private readonly http: FirebaseHttpClient;
  private readonly logger: Logger;

  constructor(context: ServiceContext) {
    this.connection = context.connection;
    this.http = context.http;
    this.logger = (context.logger ?? new NoopLogger()).child({ service: "storage" });
  }

  /**
   * Uploads `data` as `objectName`.
   */
  async upload(objectName: string, data: Uint8Array | string, options: UploadOptions = {}): Promise<UploadResult> {
    const name = requireObjectName(objectName);
    const bucket = this.bucket();
    const contentType = options.contentType ?? guessContentType(name);

    const metadata = await this.http.requestAs(
      await this.options({
        method: "POST",
        url: `${this.connection.endpoints.storageUpload}/b/${encodeURIComponent(bucket)}/o`,
        query: {
          uploadType: "media",
          name,
          predefinedAcl: options.predefinedAcl ?? "publicRead",
        },
        headers: { "Content-Type": contentType },
        body: data,
        encode: "raw",
      }),
      ObjectMetadataSchema
    );

    const size = typeof data === "string" ? Buffer.byteLength(data) : data.byteLength;
    this.logger.info(`Uploaded ${name} (${formatBytes(size)})`, { bucket });
    return { ...metadata, url: this.publicUrl(name) };
  }

  /**
   * Uploads a local file, named after the file unless `objectName` is given.
   *
   * @throws {ValidationError} If the file does not exist
   */
  async uploadFile(filePath: string, objectName?: string, options: UploadOptions = {}): Promise<UploadResult> {
    let contents: Buffer;
    try {
      contents = await readFile(filePath);
    } catch (error) {
      throw new ValidationError(`File not found: ${filePath}`, { field: "filePath", cause: error });
    }
    return this.upload(objectName ?? fileBasename(filePath), contents, options);
  }

  /**
   * Uploads every regular file directly inside `folderPath`, under `prefix`.
   */
  async uploadFolder(folderPath: string, options: UploadOptions & { prefix?: string } = {}): Promise<UploadResult[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(folderPath, { withFileTypes: true });
    } catch (error) {
      throw new ValidationError(`Folder not found: ${folderPath}`, { field: "folderPath", cause: error });
    }

    const results: UploadResult[] = [];
    for (const entry of entries.filter((candidate) => candidate.isFile())) {
      const objectName = combinePaths(options.prefix ?? "", entry.name);
      results.push(await this.uploadFile(join(folderPath, entry.name), objectName, options));
    }
    this.logger.info(`Uploaded ${results.length} files from ${folderPath}`);
    return results;
  }

  /**
   * Object contents.
   */
  async download(objectName: string): Promise<Buffer> {
    const body = await this.http.request(
      await this.options({
        method: "GET",
        url: this.objectUrl(objectName),
        query: { alt: "media" },
        responseType: "bytes",
      })
    );
    return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
  }

  /**
   * Writes the object's contents to `destination`. Returns the destination.
   */
  async downloadToFile(objectName: string, destination: string): Promise<string> {
    const contents = await this.download(objectName);
    await writeFile(destination, contents);
    this.logger.info(`Downloaded ${requireObjectName(objectName)} to ${destination} (${formatBytes(contents.length)})`);
    return destination;
  }

  async delete(objectName: string): Promise<true> {
    await this.http.request(await this.options({ method: "DELETE", url: this.objectUrl(objectName) }));
    return true;
  }

  async list(options: ListObjectsOptions = {}): Promise<ListObjectsResponse> {
    return this.http.requestAs(
      await this.options({
        method: "GET",
        url: `${this.connection.endpoints.storage}/b/${encodeURIComponent(this.bucket())}/o`,
        query: {
          maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS,
          prefix: options.prefix,
          delimiter: options.delimiter,
          pageToken: options.pageToken,
        },
      }),
      ListObjectsResponseSchema
    );
  }

  async getMetadata(objectName: string): Promise<ObjectMetadata> {
    return this.http.requestAs(
      await this.options({ method: "GET", url: this.objectUrl(objectName) }),
      ObjectMetadataSchema
    );
  }

  /**
   * Tokenized download URL, usable without credentials.
   *
   * @throws {NotFoundError} If the object has no download token
   */
  async getDownloadUrl(objectName: string): Promise<string> {
    const name = requireObjectName(objectName);
    const metadata = await this.getMetadata(name);
    const token = metadata.metadata?.["firebaseStorageDownloadTokens"]?.split(",")[0];
    if (token === undefined || token === "") {
      throw new NotFoundError(`No download token for ${name}`, { code: "NO_DOWNLOAD_TOKEN" });
    }
    const bucket = encodeURIComponent(this.bucket());
    return `${this.connection.endpoints.storageDownload}/b/${bucket}/o/${encodeURIComponent(name)}?alt=media&token=${encodeURIComponent(token)}`;
  }

  /**
   * Browser URL of an object.
   */
  publicUrl(objectName: string): string {
    return `${this.connection.endpoints.storagePublic}/${this.bucket()}/${requireObjectName(objectName)}`;
  }

  private objectUrl(objectName: string): string {
    const bucket = encodeURIComponent(this.bucket());
    return `${this.connection.endpoints.storage}/b/${bucket}/o/${encodeURIComponent(requireObjectName(objectName))}`;
  }

  private bucket(): string {
    const bucket = this.connection.storageBucket;
    if (bucket === undefined || bucket === "") {
      throw new ValidationError("Storage requires a bucket. Set FIREBASE_STORAGE_BUCKET", { field: "storageBucket" });
    }
    return bucket;
  }

  private async options(request: RequestOptions): Promise<RequestOptions> {
    const credential = await getConnectionToken(this.connection, this.http, { requireAuth: true });
    return { ...request, credential, credentialMode: "bearer" };
  }
}

function requireObjectName(objectName: string): string {
  const name = objectName.replace(/^\/+/, "");
  if (name === "") {
    throw new ValidationError("Object name must not be empty", { field: "objectName" });
  }
  return name;
}
