/**
 * Shared fixtures for service tests.
 */

import { vi, type Mock } from "vitest";
import { ConfigResolver } from "../config/index.js";
import { connect, type ConnectOptions, type Connection } from "../connection/index.js";
import { InMemoryLogger } from "../observability/index.js";
import { MockTransport } from "../simulation/mock-transport.js";
import { FirebaseHttpClient } from "../transport/http-client.js";

export const PROJECT_ID = "demo-project";
export const DATABASE_URL = "https://demo-project-default-rtdb.firebaseio.com";
export const DOCUMENTS_ROOT =
  "https://firestore.googleapis.com/v1/projects/demo-project/databases/(default)/documents";

export interface Harness {
  transport: MockTransport;
  http: FirebaseHttpClient;
  logger: InMemoryLogger;
  resolver: ConfigResolver;
  sleep: Mock<(seconds: number) => Promise<void>>;
  connection: Connection;
}

/**
 * Resolver isolated from the process environment and any config file.
 */
export function isolatedResolver(env: Record<string, string | undefined> = {}): ConfigResolver {
  return new ConfigResolver({ env, file: null });
}

export async function createHarness(options: ConnectOptions = { projectId: PROJECT_ID }): Promise<Harness> {
  const transport = new MockTransport();
  const logger = new InMemoryLogger();
  const resolver = isolatedResolver();
  const sleep = vi.fn<(seconds: number) => Promise<void>>(async () => {});
  const http = new FirebaseHttpClient({ transport, logger, sleep, random: () => 0 });
  const connection = await connect(options, { resolver, logger });
  return { transport, http, logger, resolver, sleep, connection };
}
