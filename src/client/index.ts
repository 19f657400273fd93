/**
 * Firebase client.
 *
 * Bundles a connection with the HTTP client, logger and config resolver the
 * services share, and hands out service instances bound to that connection.
 */

import { defaultConfigResolver, resolveHttpClientConfig, type ConfigResolver, type HttpClientConfig } from "../config/index.js";
import {
  closeConnection,
  connect,
  setToken,
  type ConnectOptions,
  type Connection,
  type ServiceContext,
  type TokenInput,
} from "../connection/index.js";
import { AuthService } from "../auth/index.js";
import { RealtimeDatabaseService } from "../database/index.js";
import { DynamicLinksService } from "../dynamic-links/index.js";
import { DocumentService } from "../firestore/documents.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { StorageService } from "../storage/index.js";
import { FirebaseHttpClient } from "../transport/http-client.js";
import type { HttpTransport } from "../transport/index.js";

export interface FirebaseClientOptions extends ConnectOptions {
  logger?: Logger;
  resolver?: ConfigResolver;
  transport?: HttpTransport;
  http?: Partial<HttpClientConfig>;
}

/**
 * Firebase client.
 *
 * @example
 * ```typescript
 * const client = await FirebaseClient.create({ projectId: "demo-project", apiKey: "test-api-key" });
 * const session = await client.auth().signIn("ada@example.com", "test-password");
 * const user = client.withToken(session);
 * await user.database().set("profiles/ada", { name: "Ada" });
 * ```
 */
export class FirebaseClient {
  readonly connection: Connection;
  readonly http: FirebaseHttpClient;
  readonly logger: Logger;
  readonly resolver: ConfigResolver;

  constructor(context: ServiceContext) {
    this.connection = context.connection;
    this.http = context.http;
    this.logger = context.logger ?? new NoopLogger();
    this.resolver = context.resolver ?? defaultConfigResolver;
  }

  /**
   * Connects and wires a client.
   */
  static async create(options: FirebaseClientOptions = {}): Promise<FirebaseClient> {
    const { logger = new NoopLogger(), resolver = defaultConfigResolver, transport, http, ...connectOptions } = options;
    const connection = await connect(connectOptions, { resolver, logger });
    const httpClient = new FirebaseHttpClient({
      transport,
      logger: logger.child({ component: "http" }),
      config: resolveHttpClientConfig(http),
    });
    return new FirebaseClient({ connection, http: httpClient, logger, resolver });
  }

  auth(): AuthService {
    return new AuthService(this.context());
  }

  firestore(): DocumentService {
    return new DocumentService(this.context());
  }

  database(): RealtimeDatabaseService {
    return new RealtimeDatabaseService(this.context());
  }

  storage(): StorageService {
    return new StorageService(this.context());
  }

  dynamicLinks(): DynamicLinksService {
    return new DynamicLinksService(this.context());
  }

  /**
   * A client over a copy of the connection holding `token`.
   */
  withToken(token: TokenInput): FirebaseClient {
    return new FirebaseClient({ ...this.context(), connection: setToken(this.connection, token) });
  }

  /**
   * A client over a copy of the connection without token or credentials.
   */
  signedOut(): FirebaseClient {
    return new FirebaseClient({ ...this.context(), connection: closeConnection(this.connection) });
  }

  private context(): ServiceContext {
    return { connection: this.connection, http: this.http, logger: this.logger, resolver: this.resolver };
  }
}
