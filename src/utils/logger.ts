import { isVersionCompareError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/** What a log line keeps of a failure */
export interface LoggedError {
  name: string;
  code?: number;
  message: string;
  cause?: string;
  stack?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogFields;
  error?: LoggedError;
}

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  includeTimestamp: boolean;
  structuredOutput: boolean;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Looked up per call so console spies installed after import still see output.
const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: "[version-compare]",
  minLevel: "info",
  includeTimestamp: false,
  structuredOutput: false,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

function describeError(error: unknown): LoggedError | undefined {
  if (error === undefined || error === null) return undefined;
  if (isVersionCompareError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      cause: error.cause?.message,
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: typeof error, message: String(error) };
}

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(" ");
}

/** `StorageError(2001): Object not found: k <- socket hang up` */
function formatCause(error: LoggedError): string {
  const head = error.code === undefined ? error.name : `${error.name}(${error.code})`;
  const tail = error.cause ? ` <- ${error.cause}` : "";
  return `${head}: ${error.message}${tail}`;
}

/**
 * Leveled logger for the comparison engine.
 *
 * Children share their root's settings, so `configure` on the module logger
 * reaches every component logger created from it.
 */
export class Logger {
  private readonly settings: { config: LoggerConfig };
  private readonly bindings: LogFields;

  constructor(config: Partial<LoggerConfig> = {}, parent?: { settings: { config: LoggerConfig }; bindings: LogFields }) {
    this.settings = parent?.settings ?? { config: { ...DEFAULT_CONFIG, ...config } };
    this.bindings = parent?.bindings ?? {};
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields, error?: unknown): void {
    this.write("warn", message, fields, error);
  }

  error(message: string, fields?: LogFields, error?: unknown): void {
    this.write("error", message, fields, error);
  }

  child(fields: LogFields): Logger {
    return new Logger({}, { settings: this.settings, bindings: { ...this.bindings, ...fields } });
  }

  configure(config: Partial<LoggerConfig>): void {
    this.settings.config = { ...this.settings.config, ...config };
  }

  private write(level: LogLevel, message: string, fields?: LogFields, error?: unknown): void {
    const config = this.settings.config;
    if (SEVERITY[level] < SEVERITY[config.minLevel]) return;

    const context = { ...this.bindings, ...fields };
    const failure = describeError(error);
    const sink = SINKS[level];

    if (config.structuredOutput) {
      const entry: LogEntry = { level, message, timestamp: new Date().toISOString() };
      if (Object.keys(context).length > 0) entry.context = context;
      if (failure) entry.error = failure;
      sink(JSON.stringify(entry));
      return;
    }

    const parts: string[] = [];
    if (config.includeTimestamp) parts.push(`[${new Date().toISOString()}]`);
    parts.push(config.prefix, `[${level.toUpperCase()}]`, message);
    if (Object.keys(context).length > 0) parts.push(`| ${formatFields(context)}`);
    if (failure) parts.push(`| cause=${formatCause(failure)}`);
    sink(parts.join(" "));

    if (level === "error" && failure?.stack) sink(failure.stack);
  }
}

export const logger = new Logger();

export function createLogger(fields: LogFields): Logger {
  return logger.child(fields);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
  logger.configure({ minLevel: envLevel });
}
if (process.env.VERSION_COMPARE_STRUCTURED_LOGS === "true") {
  logger.configure({ structuredOutput: true });
}
