/**
 * diagram-tf Logging
 *
 * Structured logging with levels, subsystems, per-run context and pluggable
 * transports. Log output goes to stderr so that generated files or JSON
 * results on stdout stay clean.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Minimum level a logger emits; `silent` turns it off. */
export type LogThreshold = LogLevel | "silent";

export const LOG_THRESHOLDS: readonly LogThreshold[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/**
 * Context attached to every entry a logger writes
 */
export type LogContext = {
  runId?: string;
  nodeId?: string;
  tier?: number;
  [key: string]: unknown;
};

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  context?: LogContext;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogThreshold): void;
  getLevel(): LogThreshold;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogThreshold, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
};

export function shouldLog(level: LogLevel, minLevel: LogThreshold): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogThreshold(value: string): value is LogThreshold {
  return (LOG_THRESHOLDS as readonly string[]).includes(value);
}

// =============================================================================
// Formatters
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Human-readable single-line formatter
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts = Object.entries(entry.context ?? {})
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${String(v)}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

/**
 * One JSON object per line, for log collectors.
 */
export const jsonFormatter: LogFormatter = (entry) =>
  JSON.stringify({
    time: entry.timestamp.toISOString(),
    level: entry.level,
    subsystem: entry.subsystem,
    msg: entry.message,
    ...entry.context,
    ...entry.metadata,
  });

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes formatted entries to stderr.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    process.stderr.write(`${this.formatter(entry)}\n`);
  }
}

/**
 * Keeps entries in memory; used by tests and by callers that forward logs elsewhere.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class LoggerImpl implements Logger {
  readonly subsystem: string;
  private level: LogThreshold;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: LogThreshold;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return new LoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): Logger {
    return new LoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: LogThreshold): void {
    this.level = level;
  }

  getLevel(): LogThreshold {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      ...(meta ? { metadata: meta } : {}),
      ...(Object.keys(this.context).length > 0 ? { context: this.context } : {}),
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export type LoggerOptions = {
  level?: LogThreshold;
  /** "pretty" for terminals, "json" for log collectors */
  format?: "pretty" | "json";
  transports?: LogTransport[];
};

export function createLogger(subsystem: string, options: LoggerOptions = {}): Logger {
  const transports =
    options.transports ??
    [new ConsoleTransport({ formatter: options.format === "json" ? jsonFormatter : createDefaultFormatter() })];
  return new LoggerImpl({ subsystem, level: options.level ?? "info", transports });
}

/**
 * Logger that drops everything; the default when a caller supplies none.
 */
export function createSilentLogger(subsystem = "diagram-tf"): Logger {
  return new LoggerImpl({ subsystem, level: "silent", transports: [] });
}
