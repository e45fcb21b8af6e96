export { configureLogger, logger, LogLevel, stringifyValue } from "./logger";
export type { LoggerOptions, LogRecord, LogSink } from "./logger";
