/**
 * Firebase REST client.
 *
 * A typed client for the Firebase REST surfaces: Authentication, Cloud
 * Firestore, Realtime Database, Cloud Storage and Dynamic Links. All network
 * traffic goes through one retrying HTTP client; connections are immutable
 * values that services receive explicitly.
 *
 * @example
 * ```typescript
 * import { FirebaseClient, ConsoleLogger } from "firekit-rest";
 *
 * const client = await FirebaseClient.create({
 *   projectId: "demo-project",
 *   apiKey: "test-api-key",
 *   logger: new ConsoleLogger(),
 * });
 *
 * const session = await client.auth().signIn("ada@example.com", "test-password");
 * const signedIn = client.withToken(session);
 *
 * await signedIn.firestore().set("users", "ada", { name: "Ada", age: 36 });
 * const adults = await signedIn.firestore().query("users").where("age", ">=", 18).execute();
 * ```
 */

// Client
export { FirebaseClient, type FirebaseClientOptions } from "./client/index.js";

// Errors
export * from "./errors/index.js";

// Logging
export * from "./observability/index.js";

// Configuration
export * from "./config/index.js";

// Transport
export * from "./transport/index.js";
export * from "./transport/http-client.js";
export { calculateBackoff, JITTER_FACTOR, MAX_BACKOFF_SECONDS } from "./transport/backoff.js";
export { mapHttpError, parseErrorBody, parseRetryAfter, RETRYABLE_STATUSES, type ErrorInfo } from "./transport/error-mapper.js";

// Connection and credentials
export * from "./connection/index.js";
export * from "./credentials/index.js";

// Value types
export * from "./types/index.js";

// Services
export * from "./auth/index.js";
export * from "./firestore/index.js";
export * from "./database/index.js";
export * from "./storage/index.js";
export * from "./dynamic-links/index.js";

// Utilities
export * from "./utils/paths.js";

// Testing
export * from "./simulation/mock-transport.js";
