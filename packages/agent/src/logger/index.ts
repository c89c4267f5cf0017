export { LoggerImpl, createLoggerFactory, formatFields, type LoggerFactory, type LoggerOptions } from "./logger-impl.js";
export { DEFAULT_LOG_LEVEL, LOG_LEVELS, isLevelEnabled, isLogLevel, parseLogLevel, type EmittedLogLevel, type LogLevel } from "./log-level.js";
