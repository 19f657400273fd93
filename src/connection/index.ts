/**
 * Connection
 *
 * An immutable bundle of project identity, endpoints and credentials. Every
 * modification returns a new frozen connection; none is ever changed in place.
 */

import { AuthError, ValidationError } from "../errors/index.js";
import { defaultConfigResolver, PROMPT_SENTINEL, type ConfigResolver } from "../config/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { ServiceAccountCredentials } from "../credentials/service-account.js";
import { createToken, FirebaseToken, isAuthResponse } from "../credentials/token.js";
import { NO_CREDENTIAL, type FirebaseHttpClient } from "../transport/http-client.js";
import { isValidProjectId } from "../utils/paths.js";
import {
  defaultDatabaseUrl,
  defaultStorageBucket,
  resolveEndpoints,
  stripTrailingSlash,
  type ServiceEndpoints,
} from "./endpoints.js";

export * from "./endpoints.js";

export const DEFAULT_DATABASE_ID = "(default)";

export interface Connection {
  readonly projectId?: string;
  readonly apiKey?: string;
  /** Realtime Database root, without a trailing slash */
  readonly databaseUrl?: string;
  readonly storageBucket?: string;
  /** Firestore database id */
  readonly databaseId: string;
  readonly endpoints: Readonly<ServiceEndpoints>;
  readonly credentials?: ServiceAccountCredentials;
  /** User ID token, or a raw token / database secret */
  readonly token?: FirebaseToken | string;
  readonly createdAt: Date;
}

export interface ConnectOptions {
  projectId?: string;
  apiKey?: string;
  databaseUrl?: string;
  storageBucket?: string;
  databaseId?: string;
  /** Loaded credentials or a path to a key file */
  credentials?: ServiceAccountCredentials | string;
  token?: FirebaseToken | string;
  endpoints?: Partial<ServiceEndpoints>;
}

export interface ConnectContext {
  resolver?: ConfigResolver;
  logger?: Logger;
  now?: () => Date;
}

/** Anything {@link setToken} accepts. */
export type TokenInput = FirebaseToken | { idToken: string } | string;

function hasValue(value: string | undefined): value is string {
  return value !== undefined && value !== "" && value !== NO_CREDENTIAL;
}

/**
 * Creates a connection, filling unset fields through the config resolver.
 *
 * @throws {ValidationError} If neither a project id nor a database URL is available
 *
 * @example
 * ```typescript
 * const conn = await connect({ projectId: "demo-project", apiKey: "test-api-key" });
 * conn.databaseUrl; // "https://demo-project-default-rtdb.firebaseio.com"
 * ```
 */
export async function connect(options: ConnectOptions = {}, context: ConnectContext = {}): Promise<Connection> {
  const resolver = context.resolver ?? defaultConfigResolver;
  const logger = context.logger ?? new NoopLogger();

  const credentials =
    typeof options.credentials === "string"
      ? await ServiceAccountCredentials.fromFile(options.credentials)
      : options.credentials;

  const projectId = resolver.resolve("project_id", options.projectId ?? credentials?.projectId);
  const apiKey = resolver.resolve("api_key", options.apiKey);
  const explicitDatabaseUrl = resolver.resolve("database_url", options.databaseUrl);

  if (projectId === undefined && explicitDatabaseUrl === undefined) {
    throw new ValidationError("Either projectId or databaseUrl must be provided", { field: "projectId" });
  }
  if (projectId !== undefined && !isValidProjectId(projectId)) {
    logger.warn(`Project id '${projectId}' does not look like a valid Firebase project id`);
  }

  const databaseUrl =
    explicitDatabaseUrl !== undefined
      ? stripTrailingSlash(explicitDatabaseUrl)
      : projectId !== undefined
        ? defaultDatabaseUrl(projectId)
        : undefined;
  const storageBucket =
    resolver.resolve("storage_bucket", options.storageBucket) ??
    (projectId !== undefined ? defaultStorageBucket(projectId) : undefined);

  const token = typeof options.token === "string" && !hasValue(options.token) ? undefined : options.token;

  return freeze({
    projectId,
    apiKey,
    databaseUrl,
    storageBucket,
    databaseId: options.databaseId ?? DEFAULT_DATABASE_ID,
    endpoints: resolveEndpoints(options.endpoints),
    credentials,
    token,
    createdAt: context.now?.() ?? new Date(),
  });
}

function freeze(connection: Connection): Connection {
  return Object.freeze(connection);
}

/**
 * Returns a copy of the connection holding `token`.
 * Sign-in responses are converted to a {@link FirebaseToken} bound to the
 * connection's API key.
 *
 * @throws {ValidationError} If the value is not a usable token
 */
export function setToken(connection: Connection, token: TokenInput): Connection {
  if (token instanceof FirebaseToken) {
    return freeze({ ...connection, token });
  }
  if (typeof token === "string") {
    if (token === "") {
      throw new ValidationError("Token must be a non-empty string", { field: "token" });
    }
    return freeze({ ...connection, token });
  }
  if (isAuthResponse(token)) {
    return freeze({ ...connection, token: createToken(token, connection.apiKey) });
  }
  throw new ValidationError("Token must be a FirebaseToken, a sign-in response or a string", { field: "token" });
}

/**
 * Returns a copy of the connection with its token and credentials released.
 */
export function closeConnection(connection: Connection): Connection {
  return freeze({ ...connection, token: undefined, credentials: undefined });
}

export interface ConnectionTokenOptions {
  requireAuth?: boolean;
  scopes?: readonly string[];
}

/**
 * Credential to present for a request: the user token (refreshed when close
 * to expiry), else a service-account access token.
 *
 * @throws {AuthError} With `requireAuth` when no credential is available
 */
export async function getConnectionToken(
  connection: Connection,
  http: FirebaseHttpClient,
  options: ConnectionTokenOptions = {}
): Promise<string | undefined> {
  const token = connection.token;
  if (token instanceof FirebaseToken) {
    return token.getToken({ http, tokenUrl: connection.endpoints.token, apiKey: connection.apiKey });
  }
  if (typeof token === "string" && hasValue(token)) {
    return token;
  }
  if (connection.credentials !== undefined) {
    return connection.credentials.getAccessToken(http, options.scopes);
  }
  if (options.requireAuth) {
    throw new AuthError("Authentication required. Sign in or provide service account credentials", {
      code: "AUTH_REQUIRED",
    });
  }
  return undefined;
}

export interface LegacyConnectionParams {
  /** Realtime Database URL, e.g. `https://demo-project-default-rtdb.firebaseio.com` */
  projectURL: string;
  projectAPI?: string;
  token?: string;
  /** Database secret; preferred over `token` when set */
  secretKey?: string;
}

/**
 * Builds a connection from the URL/API key/token/secret parameter set used by
 * older call sites.
 */
export async function connectFromLegacy(
  params: LegacyConnectionParams,
  context: ConnectContext = {}
): Promise<Connection> {
  const databaseUrl = stripTrailingSlash(params.projectURL);
  const projectId = projectIdFromDatabaseUrl(databaseUrl);

  const secret = params.secretKey;
  const token =
    secret !== undefined && hasValue(secret) && secret !== PROMPT_SENTINEL
      ? secret
      : params.token !== undefined && hasValue(params.token)
        ? params.token
        : undefined;

  return connect(
    {
      projectId,
      apiKey: hasValue(params.projectAPI ?? "") ? params.projectAPI : undefined,
      databaseUrl,
      token,
    },
    context
  );
}

/**
 * Project id encoded in a Realtime Database host name.
 */
export function projectIdFromDatabaseUrl(databaseUrl: string): string | undefined {
  const match = /^https?:\/\/([^./]+)\./.exec(databaseUrl);
  return match?.[1]?.replace(/-default-rtdb$/, "");
}

/**
 * What every service needs: the connection, the shared HTTP client and
 * ambient collaborators.
 */
export interface ServiceContext {
  readonly connection: Connection;
  readonly http: FirebaseHttpClient;
  readonly logger?: Logger;
  readonly resolver?: ConfigResolver;
}
