/**
 * Logging for the Firebase REST client.
 *
 * Services accept any {@link Logger}; the default is {@link NoopLogger} so the
 * library stays silent unless the caller wires one in.
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const SENSITIVE_FIELDS = new Set([
  "token",
  "idtoken",
  "refreshtoken",
  "accesstoken",
  "apikey",
  "key",
  "auth",
  "authorization",
  "password",
  "privatekey",
  "private_key",
  "secret",
  "clientsecret",
  "client_secret",
]);

function isRecord(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replaces values of credential-bearing keys with a placeholder.
 */
export function redactSensitive(obj: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = "[REDACTED]";
    } else if (isRecord(value) && !(value instanceof Date)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Parses a level name such as `"warn"` (case-insensitive).
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  switch (name?.trim().toLowerCase()) {
    case "trace":
      return LogLevel.Trace;
    case "debug":
      return LogLevel.Debug;
    case "info":
      return LogLevel.Info;
    case "warn":
    case "warning":
      return LogLevel.Warn;
    case "error":
      return LogLevel.Error;
    default:
      return fallback;
  }
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: LogContext;
  format?: "json" | "pretty";
}

/**
 * Console logger. Warnings and errors go to stderr.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: LogContext;
  private readonly format: "json" | "pretty";

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? "pretty";
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const line = formatLogLine(level, message, redactSensitive({ ...this.context, ...context }), this.format);
    if (level >= LogLevel.Warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Renders one log record in the given format.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context: LogContext,
  format: "json" | "pretty",
  timestamp: Date = new Date()
): string {
  const levelName = LogLevel[level].toUpperCase();
  if (format === "json") {
    return JSON.stringify({ timestamp: timestamp.toISOString(), level: levelName, message, ...context });
  }
  const contextStr = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `[${timestamp.toISOString()}] ${levelName}: ${message}${contextStr}`;
}

/**
 * No-op logger for disabled logging.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private readonly records: LogRecord[];
  private readonly context: LogContext;

  constructor(context: LogContext = {}, records: LogRecord[] = []) {
    this.context = context;
    this.records = records;
  }

  trace(message: string, context?: LogContext): void {
    this.addLog(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.addLog(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.addLog(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.addLog(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.addLog(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    // Shares the record buffer with the parent
    return new InMemoryLogger({ ...this.context, ...context }, this.records);
  }

  getLogs(): LogRecord[] {
    return [...this.records];
  }

  getLogsByLevel(level: LogLevel): LogRecord[] {
    return this.records.filter((record) => record.level === level);
  }

  /** Messages logged at the given level, in order. */
  messages(level: LogLevel): string[] {
    return this.getLogsByLevel(level).map((record) => record.message);
  }

  clear(): void {
    this.records.length = 0;
  }

  private addLog(level: LogLevel, message: string, context?: LogContext): void {
    this.records.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }
}
