/**
 * JSON profile file.
 *
 * ```json
 * {
 *   "default": { "project_id": "demo-project", "api_key": "..." },
 *   "staging": { "project_id": "demo-staging" }
 * }
 * ```
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { NoopLogger, type Logger } from "../observability/index.js";

/**
 * A source of per-profile configuration values.
 */
export interface ConfigFileSource {
  /** Path of the first existing config file, if any. */
  find(): string | undefined;
  /** Values of `profile` in the file at `path`, or null when unavailable. */
  load(path: string, profile: string): Record<string, string> | null;
}

const ProfileFileSchema = z.record(
  z.string(),
  z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String))
);

export const CONFIG_FILE_NAME = ".firekit.json";

export interface JsonConfigFileOptions {
  /** Explicit search list; overrides the cwd/home defaults */
  searchPaths?: string[];
  cwd?: string;
  homeDir?: string;
  logger?: Logger;
}

/**
 * Reads profiles from `./.firekit.json`, `~/.firekit.json` or
 * `~/.firekit/config.json`, first match wins.
 */
export class JsonConfigFile implements ConfigFileSource {
  private readonly options: JsonConfigFileOptions;
  private readonly logger: Logger;

  constructor(options: JsonConfigFileOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  searchPaths(): string[] {
    if (this.options.searchPaths) {
      return [...this.options.searchPaths];
    }
    const cwd = this.options.cwd ?? process.cwd();
    const home = this.options.homeDir ?? homedir();
    return [
      join(cwd, CONFIG_FILE_NAME),
      join(home, CONFIG_FILE_NAME),
      join(home, ".firekit", "config.json"),
    ];
  }

  find(): string | undefined {
    return this.searchPaths().find((path) => existsSync(path));
  }

  load(path: string, profile: string): Record<string, string> | null {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (error) {
      this.logger.warn(`Could not read configuration file: ${path}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Configuration file is not valid JSON: ${path}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = ProfileFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Configuration file has an unexpected shape: ${path}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return null;
    }

    const values = parsed.data[profile];
    if (values === undefined) {
      this.logger.warn(`Profile '${profile}' not found in configuration file`, { path });
      return null;
    }
    return values;
  }
}
