/**
 * Configuration
 *
 * Connection parameters are looked up through {@link ConfigResolver}: an
 * explicit value wins, then the session store, then the process environment,
 * then the JSON profile file, then the caller's default.
 */

import { z } from "zod";
import { ValidationError } from "../errors/index.js";
import { NoopLogger, type Logger } from "../observability/index.js";
import { JsonConfigFile, type ConfigFileSource } from "./file.js";

export { JsonConfigFile, type ConfigFileSource, type JsonConfigFileOptions } from "./file.js";

/**
 * Environment variable consulted for each configuration key.
 */
export const ENV_VARS = {
  project_id: "FIREBASE_PROJECT_ID",
  api_key: "FIREBASE_API_KEY",
  database_url: "FIREBASE_DATABASE_URL",
  storage_bucket: "FIREBASE_STORAGE_BUCKET",
  service_account: "GOOGLE_APPLICATION_CREDENTIALS",
  service_account_json: "FIREBASE_SERVICE_ACCOUNT_JSON",
  client_id: "FIREBASE_CLIENT_ID",
  client_secret: "FIREBASE_CLIENT_SECRET",
} as const;

export type ConfigKey = keyof typeof ENV_VARS;

export const CONFIG_KEYS = Object.keys(ENV_VARS).filter(isConfigKey);

/** Keys that may be placed in the session store. */
export const SESSION_KEYS = [
  "project_id",
  "api_key",
  "database_url",
  "storage_bucket",
  "client_id",
  "client_secret",
] as const;

export type SessionKey = (typeof SESSION_KEYS)[number];

/** Keys whose values are masked by {@link ConfigResolver.describe}. */
const SECRET_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>(["api_key", "client_secret"]);

/** Explicit value that means "not supplied". */
export const PROMPT_SENTINEL = "prompt";

export const DEFAULT_PROFILE = "default";

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ENV_VARS, key);
}

export function isSessionKey(key: string): key is SessionKey {
  return SESSION_KEYS.some((sessionKey) => sessionKey === key);
}

function isSet(value: string | null | undefined): value is string {
  return value !== undefined && value !== null && value !== "";
}

/**
 * In-memory key/value store scoped to one resolver (typically one process).
 */
export class SessionConfigStore {
  private readonly values = new Map<SessionKey, string>();
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  get(key: ConfigKey): string | undefined {
    return isSessionKey(key) ? this.values.get(key) : undefined;
  }

  /**
   * Stores the given values and returns what they replaced.
   * Unknown keys are skipped with a warning; empty values remove the key.
   */
  set(values: Record<string, string | null | undefined>): Partial<Record<SessionKey, string>> {
    const previous: Partial<Record<SessionKey, string>> = {};
    for (const [key, value] of Object.entries(values)) {
      if (!isSessionKey(key)) {
        this.logger.warn(`Unknown configuration key: ${key}`, { configKey: key });
        continue;
      }
      const old = this.values.get(key);
      if (old !== undefined) {
        previous[key] = old;
      }
      if (isSet(value)) {
        this.values.set(key, value);
      } else {
        this.values.delete(key);
      }
    }
    return previous;
  }

  /**
   * Clears the given keys, or every key when none are given.
   */
  clear(keys?: readonly SessionKey[]): void {
    if (keys === undefined) {
      this.values.clear();
      return;
    }
    for (const key of keys) {
      this.values.delete(key);
    }
  }

  entries(): Partial<Record<SessionKey, string>> {
    return Object.fromEntries(this.values);
  }
}

export interface ConfigResolverOptions {
  session?: SessionConfigStore;
  /** Environment to read; defaults to the live `process.env` */
  env?: Record<string, string | undefined>;
  /** Profile file source; `null` disables file lookup */
  file?: ConfigFileSource | null;
  logger?: Logger;
}

export interface ResolveOptions {
  default?: string;
  profile?: string;
}

/**
 * Resolves configuration values from layered sources.
 *
 * @example
 * ```typescript
 * const resolver = new ConfigResolver();
 * resolver.set({ project_id: "demo-project" });
 * resolver.resolve("project_id"); // "demo-project"
 * resolver.resolve("project_id", "explicit-project"); // "explicit-project"
 * ```
 */
export class ConfigResolver {
  readonly session: SessionConfigStore;
  private readonly env: Record<string, string | undefined>;
  private readonly file: ConfigFileSource | null;
  private readonly logger: Logger;

  constructor(options: ConfigResolverOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.session = options.session ?? new SessionConfigStore(this.logger);
    this.env = options.env ?? process.env;
    this.file = options.file === undefined ? new JsonConfigFile({ logger: this.logger }) : options.file;
  }

  /**
   * Returns the first non-empty value among the explicit value, the session
   * store, the environment, the profile file and the default. Never throws.
   */
  resolve(key: ConfigKey, explicit: string | null | undefined, options: ResolveOptions & { default: string }): string;
  resolve(key: ConfigKey, explicit?: string | null, options?: ResolveOptions): string | undefined;
  resolve(key: ConfigKey, explicit?: string | null, options: ResolveOptions = {}): string | undefined {
    if (isSet(explicit) && explicit !== PROMPT_SENTINEL) {
      return explicit;
    }

    const fromSession = this.session.get(key);
    if (isSet(fromSession)) {
      return fromSession;
    }

    const fromEnv = this.env[ENV_VARS[key]];
    if (isSet(fromEnv)) {
      return fromEnv;
    }

    const fromFile = this.lookupFile(key, options.profile ?? DEFAULT_PROFILE);
    if (isSet(fromFile)) {
      return fromFile;
    }

    return options.default;
  }

  set(values: Record<string, string | null | undefined>): Partial<Record<SessionKey, string>> {
    return this.session.set(values);
  }

  clear(keys?: readonly SessionKey[]): void {
    this.session.clear(keys);
  }

  /**
   * Copies a profile from the config file into the session store.
   * Returns false when no file or profile could be read.
   */
  loadProfile(path?: string, profile: string = DEFAULT_PROFILE): boolean {
    if (this.file === null) {
      return false;
    }
    const filePath = path ?? this.file.find();
    if (filePath === undefined) {
      this.logger.warn("No configuration file found");
      return false;
    }
    const values = this.file.load(filePath, profile);
    if (values === null) {
      return false;
    }
    const sessionValues = Object.fromEntries(Object.entries(values).filter(([key]) => isSessionKey(key)));
    this.session.set(sessionValues);
    this.logger.info(`Loaded configuration profile '${profile}'`, { path: filePath });
    return true;
  }

  /**
   * Resolved value of every key, with secrets masked to their first 8 characters.
   */
  describe(profile?: string): Record<ConfigKey, string | undefined> {
    const result: Partial<Record<ConfigKey, string | undefined>> = {};
    for (const key of CONFIG_KEYS) {
      const value = this.resolve(key, undefined, { profile });
      result[key] = value !== undefined && SECRET_KEYS.has(key) ? maskSecret(value) : value;
    }
    return {
      project_id: result.project_id,
      api_key: result.api_key,
      database_url: result.database_url,
      storage_bucket: result.storage_bucket,
      service_account: result.service_account,
      service_account_json: result.service_account_json,
      client_id: result.client_id,
      client_secret: result.client_secret,
    };
  }

  private lookupFile(key: ConfigKey, profile: string): string | undefined {
    if (this.file === null) {
      return undefined;
    }
    const path = this.file.find();
    return path === undefined ? undefined : this.file.load(path, profile)?.[key];
  }
}

/**
 * Shows the first 8 characters of a secret followed by `...`.
 */
export function maskSecret(value: string): string {
  return value.length > 8 ? `${value.slice(0, 8)}...` : value;
}

/**
 * Process-wide resolver used when callers pass none.
 * Intended for a single writer; construct a dedicated resolver for isolation.
 */
export const defaultConfigResolver = new ConfigResolver();

// ============================================================================
// HTTP client settings
// ============================================================================

/**
 * Retry and timeout settings for the HTTP client. Durations are in seconds.
 */
export interface HttpClientConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  timeoutSeconds: number;
}

export const DEFAULT_HTTP_CLIENT_CONFIG: Readonly<HttpClientConfig> = Object.freeze({
  maxRetries: 3,
  baseDelay: 1,
  maxDelay: 60,
  timeoutSeconds: 120,
});

const HttpClientConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  baseDelay: z.number().positive(),
  maxDelay: z.number().positive(),
  timeoutSeconds: z.number().positive(),
});

/**
 * Merges the given settings over the defaults and validates the result.
 *
 * @throws {ValidationError} If a setting is out of range
 */
export function resolveHttpClientConfig(partial: Partial<HttpClientConfig> = {}): HttpClientConfig {
  const result = HttpClientConfigSchema.safeParse({ ...DEFAULT_HTTP_CLIENT_CONFIG, ...partial });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid HTTP client configuration: ${issues.join("; ")}`, {
      details: result.error.issues,
    });
  }
  return result.data;
}
