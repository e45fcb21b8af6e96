/**
 * Define log levels
 * Controlled by `configureLogger({ level })`, falling back to `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface LoggerOptions {
  level?: LogLevel | string;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVELS: readonly string[] = Object.values(LogLevel);

let configuredLevel: LogLevel | null = null;
let sink: LogSink | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.includes(value);
}

function parseLevel(value: string | undefined): LogLevel | null {
  const upper = value?.toUpperCase();
  return upper && isLogLevel(upper) ? upper : null;
}

const getCurrentLogLevel = (): LogLevel => {
  return configuredLevel ?? parseLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const colorize = (message: string, level: LogLevel): string => {
  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
    [LogLevel.LOG]: null,
  };

  const color = colors[level];
  return color === null ? message : `${color}${message}\x1b[0m`;
};

const formatHeader = (level: LogLevel): string => {
  return colorize(`[${new Date().toISOString()}] [${level}]`, level);
};

/**
 * JSON rendering that keeps bigint amounts readable
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Error) return value.message;
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v)) ?? String(value);
}

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);
}

function toFields(args: unknown[]): Record<string, string> | undefined {
  // logger.info("msg", { ...fields })
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = stringifyValue(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringifyValue(first);

  // the fields object lives in `fields`, not in the message
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringifyValue).join(" ")}`.trim();
}

function emit(level: LogLevel, args: unknown[], consoleFn: (...a: unknown[]) => void): void {
  if (!shouldLog(level)) return;

  if (sink) {
    sink.write({ tsMs: Date.now(), level, message: toMessage(args), fields: toFields(args) });
    return;
  }

  const fields = toFields(args);
  const suffix = fields ? ` ${stringifyValue(fields)}` : "";
  consoleFn(formatHeader(level), `${toMessage(args)}${suffix}`);
}

/**
 * Set the process-wide level. Unknown names keep the current level.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level === undefined) return;
  const parsed = parseLevel(options.level);
  if (parsed) configuredLevel = parsed;
}

export const logger = {
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, args, console.log);
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, args, console.info);
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, args, console.log);
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, args, console.warn);
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, args, console.error);
  },
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a custom sink (e.g., a report collector) instead of the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
  /**
   * Drop any level set through `configureLogger`.
   */
  resetLevel: () => {
    configuredLevel = null;
  },
};
