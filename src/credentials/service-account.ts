/**
 * Service account credentials.
 *
 * Signs a JWT assertion with the account's private key and exchanges it at
 * the OAuth2 token endpoint for a short-lived access token.
 */

import { readFile } from "node:fs/promises";
import * as jose from "jose";
import { z } from "zod";
import { AuthError, ValidationError } from "../errors/index.js";
import { defaultConfigResolver, type ConfigResolver } from "../config/index.js";
import { DEFAULT_ENDPOINTS } from "../connection/endpoints.js";
import type { FirebaseHttpClient } from "../transport/http-client.js";

/** Scopes covering Realtime Database, Firestore and Cloud Storage. */
export const DEFAULT_SCOPES: readonly string[] = [
  "https://www.googleapis.com/auth/firebase.database",
  "https://www.googleapis.com/auth/userinfo.email",
  "https://www.googleapis.com/auth/datastore",
  "https://www.googleapis.com/auth/devstorage.read_write",
];

/** Cached access tokens are reused until this close to expiry. */
export const ACCESS_TOKEN_MARGIN_SECONDS = 60;

const ASSERTION_LIFETIME_SECONDS = 3600;

const JWT_BEARER_GRANT = "urn:ietf:params:oauth:grant-type:jwt-bearer";

/**
 * Service account key file, as downloaded from the console.
 */
const ServiceAccountKeySchema = z
  .object({
    type: z.literal("service_account").optional(),
    project_id: z.string().optional(),
    private_key_id: z.string().optional(),
    private_key: z.string().min(1, "private_key is required"),
    client_email: z.string().email("client_email must be an email address"),
    client_id: z.string().optional(),
    token_uri: z.string().url().optional(),
  })
  .passthrough();

export type ServiceAccountKeyFile = z.input<typeof ServiceAccountKeySchema>;

export interface ServiceAccountKey {
  projectId?: string;
  privateKeyId?: string;
  privateKey: string;
  clientEmail: string;
  tokenUri: string;
}

const AccessTokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
    token_type: z.string().optional(),
  })
  .passthrough();

interface CachedToken {
  token: string;
  expiresAt: Date;
  scope: string;
}

/**
 * Validates a parsed key file.
 *
 * @throws {ValidationError} If required fields are missing or malformed
 */
export function parseServiceAccountKey(value: unknown): ServiceAccountKey {
  const result = ServiceAccountKeySchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid service account key: ${result.error.issues.map((issue) => issue.message).join("; ")}`,
      { field: "serviceAccount", details: result.error.issues }
    );
  }
  const key = result.data;
  return {
    projectId: key.project_id,
    privateKeyId: key.private_key_id,
    privateKey: key.private_key,
    clientEmail: key.client_email,
    tokenUri: key.token_uri ?? DEFAULT_ENDPOINTS.oauthToken,
  };
}

export interface ServiceAccountCredentialsOptions {
  now?: () => Date;
}

export interface LoadServiceAccountOptions {
  /** Path to a key file */
  path?: string;
  /** Inline key as a JSON string or parsed object */
  json?: string | object;
  resolver?: ConfigResolver;
}

/**
 * Access tokens for a service account.
 *
 * Concurrent callers that find the cache stale may each perform an exchange;
 * the last one to finish owns the cache.
 *
 * @example
 * ```typescript
 * const credentials = await ServiceAccountCredentials.fromFile("./service-account.json");
 * const accessToken = await credentials.getAccessToken(http);
 * ```
 */
export class ServiceAccountCredentials {
  readonly key: ServiceAccountKey;
  private cachedToken?: CachedToken;
  private readonly now: () => Date;

  constructor(key: ServiceAccountKey, options: ServiceAccountCredentialsOptions = {}) {
    this.key = key;
    this.now = options.now ?? (() => new Date());
  }

  get projectId(): string | undefined {
    return this.key.projectId;
  }

  get clientEmail(): string {
    return this.key.clientEmail;
  }

  static fromJson(json: string | object, options?: ServiceAccountCredentialsOptions): ServiceAccountCredentials {
    let value: unknown = json;
    if (typeof json === "string") {
      try {
        value = JSON.parse(json);
      } catch {
        throw new ValidationError("Service account JSON could not be parsed", { field: "serviceAccount" });
      }
    }
    return new ServiceAccountCredentials(parseServiceAccountKey(value), options);
  }

  static async fromFile(path: string, options?: ServiceAccountCredentialsOptions): Promise<ServiceAccountCredentials> {
    let contents: string;
    try {
      contents = await readFile(path, "utf-8");
    } catch (error) {
      throw new ValidationError(`Service account file not found: ${path}`, {
        field: "serviceAccount",
        cause: error,
      });
    }
    return ServiceAccountCredentials.fromJson(contents, options);
  }

  /**
   * Loads credentials from an explicit path or JSON, falling back to the
   * `service_account` (path) and `service_account_json` configuration keys.
   *
   * @throws {ValidationError} If no source is configured or the key is invalid
   */
  static async load(
    options: LoadServiceAccountOptions = {},
    credentialOptions?: ServiceAccountCredentialsOptions
  ): Promise<ServiceAccountCredentials> {
    if (options.json !== undefined) {
      return ServiceAccountCredentials.fromJson(options.json, credentialOptions);
    }
    const resolver = options.resolver ?? defaultConfigResolver;
    const path = resolver.resolve("service_account", options.path);
    if (path !== undefined) {
      return ServiceAccountCredentials.fromFile(path, credentialOptions);
    }
    const inline = resolver.resolve("service_account_json");
    if (inline !== undefined) {
      return ServiceAccountCredentials.fromJson(inline, credentialOptions);
    }
    throw new ValidationError(
      "No service account configured. Set GOOGLE_APPLICATION_CREDENTIALS or FIREBASE_SERVICE_ACCOUNT_JSON",
      { field: "serviceAccount" }
    );
  }

  /**
   * True while a cached token for `scopes` has more than a minute left.
   */
  hasValidToken(scopes: readonly string[] = DEFAULT_SCOPES): boolean {
    const cached = this.cachedToken;
    return (
      cached !== undefined &&
      cached.scope === scopes.join(" ") &&
      this.now().getTime() < cached.expiresAt.getTime() - ACCESS_TOKEN_MARGIN_SECONDS * 1000
    );
  }

  /**
   * Returns a cached access token or exchanges a fresh assertion for one.
   */
  async getAccessToken(http: FirebaseHttpClient, scopes: readonly string[] = DEFAULT_SCOPES): Promise<string> {
    if (this.cachedToken !== undefined && this.hasValidToken(scopes)) {
      return this.cachedToken.token;
    }

    const assertion = await this.createAssertion(scopes);
    const response = await http.requestAs(
      {
        method: "POST",
        url: this.key.tokenUri,
        body: { grant_type: JWT_BEARER_GRANT, assertion },
        encode: "form",
      },
      AccessTokenResponseSchema
    );

    this.cachedToken = {
      token: response.access_token,
      expiresAt: new Date(this.now().getTime() + response.expires_in * 1000),
      scope: scopes.join(" "),
    };
    return response.access_token;
  }

  /**
   * Signs the RS256 JWT assertion presented to the token endpoint.
   *
   * @throws {AuthError} If the private key cannot be used for signing
   */
  async createAssertion(scopes: readonly string[] = DEFAULT_SCOPES): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const expiresAt = issuedAt + ASSERTION_LIFETIME_SECONDS;

    try {
      const privateKey = await jose.importPKCS8(this.key.privateKey, "RS256");

      const header: jose.JWTHeaderParameters = { alg: "RS256", typ: "JWT" };
      if (this.key.privateKeyId) {
        header.kid = this.key.privateKeyId;
      }

      return await new jose.SignJWT({ scope: scopes.join(" ") })
        .setProtectedHeader(header)
        .setIssuer(this.key.clientEmail)
        .setSubject(this.key.clientEmail)
        .setAudience(this.key.tokenUri)
        .setIssuedAt(issuedAt)
        .setExpirationTime(expiresAt)
        .sign(privateKey);
    } catch (error) {
      throw new AuthError(
        `Failed to sign service account assertion: ${error instanceof Error ? error.message : String(error)}`,
        { code: "INVALID_PRIVATE_KEY", cause: error }
      );
    }
  }
}
