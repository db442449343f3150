// ── Log levels ───────────────────────────────────────────────────────────────

/** Numeric log level constants. Lower = more verbose. */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
} as const;

/** Union type of all log level numeric values. */
export type LogLevelValue = (typeof LogLevel)[keyof typeof LogLevel];

// ── Logger interface ─────────────────────────────────────────────────────────

/** Leveled logger that writes to stderr. */
export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

// ── Options ──────────────────────────────────────────────────────────────────

/** Options for creating a logger instance. */
export interface LoggerOptions {
  level?: LogLevelValue;
  /** Prefix written after the level tag, e.g. the component name. */
  scope?: string;
}

// ── Factory ──────────────────────────────────────────────────────────────────

function resolveLevel(options?: LoggerOptions): LogLevelValue {
  if (options?.level !== undefined) return options.level;
  if (process.env["CSEARCH_DEBUG"] === "1") return LogLevel.DEBUG;
  return LogLevel.INFO;
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function write(level: string, scope: string | undefined, msg: string, args: unknown[]): void {
  const extra = args.length > 0 ? ` ${args.map(formatArg).join(" ")}` : "";
  const prefix = scope ? `[${level}] ${scope}: ` : `[${level}] `;
  process.stderr.write(`${prefix}${msg}${extra}\n`);
}

/** Create a logger. Respects `CSEARCH_DEBUG=1` env var for debug output. */
export function createLogger(options?: LoggerOptions): Logger {
  const minLevel = resolveLevel(options);
  const scope = options?.scope;

  return {
    debug(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.DEBUG) write("debug", scope, msg, args);
    },
    info(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.INFO) write("info", scope, msg, args);
    },
    warn(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.WARN) write("warn", scope, msg, args);
    },
    error(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.ERROR) write("error", scope, msg, args);
    },
  };
}

/** Logger that discards everything. Handy default for library callers and tests. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
