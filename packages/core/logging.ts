/**
 * Logging interfaces
 */

import { HiResClock, type Timestamp } from "./time.js"
import type { Optional } from "./type/utils.js"

/**
 * Levels for logging information
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 10,
  WARN = 20,
  INFO = 30,
  DEBUG = 40,
}

let DEFAULT_LOG_LEVEL: LogLevel = LogLevel.INFO

export function setDefaultLogLevel(level: LogLevel): void {
  DEFAULT_LOG_LEVEL = level
}

/**
 * Parse a configuration value into a {@link LogLevel}
 *
 * @param value The name ("debug", "WARN", ...) or numeric value of the level
 * @returns The matching {@link LogLevel} if the value is recognized
 */
export function parseLogLevel(value: unknown): Optional<LogLevel> {
  if (typeof value === "number") {
    return LOG_LEVELS.find((l) => l === value)
  }

  if (typeof value === "string") {
    switch (value.trim().toUpperCase()) {
      case "FATAL":
        return LogLevel.FATAL
      case "ERROR":
        return LogLevel.ERROR
      case "WARN":
      case "WARNING":
        return LogLevel.WARN
      case "INFO":
        return LogLevel.INFO
      case "DEBUG":
        return LogLevel.DEBUG
    }
  }

  return
}

const LOG_LEVELS: LogLevel[] = [
  LogLevel.FATAL,
  LogLevel.ERROR,
  LogLevel.WARN,
  LogLevel.INFO,
  LogLevel.DEBUG,
]

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Timestamp
  source?: string
  context?: unknown
}

/**
 * Formatter for {@link LogData} entries
 */
export type LogFormatter = (data: LogData) => string

/**
 * Simple format for {@link LogData} objects
 *
 * @param data The {@link LogData} to format
 * @returns A string with the time, source, level and message
 */
export const SimpleLogFormatter: LogFormatter = (data: LogData) =>
  `${data.timestamp ? `[${data.timestamp.toISOString()}]:` : ""}${data.source ? `(${data.source}) ` : ""}${ReadableLogLevels[data.level]} - ${data.message}`

/**
 * Formats {@link LogData} as a single JSON line, errors in the context are
 * reduced to their name, message and stack
 *
 * @param data The {@link LogData} to format
 * @returns A JSON string
 */
export const JsonLogFormatter: LogFormatter = (data: LogData) =>
  JSON.stringify({
    time: data.timestamp?.toISOString(),
    level: ReadableLogLevels[data.level],
    source: data.source,
    message: data.message,
    context:
      data.context instanceof Error
        ? {
            name: data.context.name,
            message: data.context.message,
            stack: data.context.stack,
          }
        : data.context,
  })

/**
 * Simple interface for writing {@link LogData} to some source
 */
export interface LogWriter {
  /**
   * Writes the {@link LogData} to the underlying source
   *
   * @param data The {@link LogData} to write
   */
  log(data: LogData): void
}

/**
 * {@link LogWriter} that does nothing
 */
export const NoopLogWriter: LogWriter = {
  log(_data: LogData): void {},
}

let DEFAULT_WRITER: LogWriter = NoopLogWriter

/**
 * Sets the default log writer used by loggers created after this call and by
 * the global logger
 *
 * @param writer The {@link LogWriter} to use for new log creation
 */
export function setDefaultWriter(writer: LogWriter): void {
  DEFAULT_WRITER = writer

  GLOBAL_LOGGER = new DefaultLogger({
    name: GLOBAL_LOGGER.name,
    writer,
    level: GLOBAL_LOGGER.level,
  })
}

/**
 * Simple interface for logging information
 */
export interface Logger {
  /** The current {@link LogLevel} */
  readonly level: LogLevel

  /** The source for events logged here */
  readonly name?: string

  /**
   * Update the {@link LogLevel} minimum to write with
   * @param level The new {@link LogLevel} to use
   */
  setLevel(level: LogLevel): void

  /**
   * Writes a {@link LogLevel.DEBUG} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  debug(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.INFO} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  info(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.WARN} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  warn(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.ERROR} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  error(message: string, context?: unknown): void

  /**
   * Writes a {@link LogLevel.FATAL} event
   *
   * @param message The message to log
   * @param context The additional context for the message
   */
  fatal(message: string, context?: unknown): void
}

/**
 * Options for configuring loggers
 */
export interface LoggerOptions {
  /** Optional {@link LogLevel} for initial logging, default is the current default level */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter}, default is the current default writer */
  writer?: LogWriter
}

/**
 * Simple {@link LogWriter} that outputs to the console
 */
export class ConsoleLogWriter implements LogWriter {
  private _formatter: LogFormatter

  constructor(formatter?: LogFormatter) {
    this._formatter = formatter ?? SimpleLogFormatter
  }

  log(data: LogData): void {
    // eslint-disable-next-line no-console
    console.log(this._formatter(data))
  }
}

/**
 * {@link LogWriter} that keeps every entry in memory, mostly useful for tests
 */
export class BufferedLogWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }

  clear(): void {
    this.entries.length = 0
  }
}

/**
 * Helpers for optimizing log levels
 */
type MessageLogger = (message: string, context?: unknown) => void
const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Simple logger that swaps the level methods between real writers and no-op
 * functions when the level changes
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private _writer: LogWriter
  readonly name?: string

  debug: MessageLogger
  info: MessageLogger
  warn: MessageLogger
  error: MessageLogger
  fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? DEFAULT_LOG_LEVEL
    this._writer = options?.writer ?? DEFAULT_WRITER
    this.name = options?.name

    this.debug = NO_OP_LOGGER
    this.info = NO_OP_LOGGER
    this.warn = NO_OP_LOGGER
    this.error = NO_OP_LOGGER
    this.fatal = (message, context) =>
      this._write(LogLevel.FATAL, message, context)

    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  /**
   * Replace the {@link LogWriter} for this logger
   *
   * @param writer The new {@link LogWriter}
   */
  setWriter(writer: LogWriter): void {
    this._writer = writer
  }

  setLevel(level: LogLevel): void {
    this._reset()
    this._level = level

    switch (level) {
      case LogLevel.DEBUG:
        this.debug = (message, context) =>
          this._write(LogLevel.DEBUG, message, context)
      // eslint-disable-next-line no-fallthrough
      case LogLevel.INFO:
        this.info = (message, context) =>
          this._write(LogLevel.INFO, message, context)
      // eslint-disable-next-line no-fallthrough
      case LogLevel.WARN:
        this.warn = (message, context) =>
          this._write(LogLevel.WARN, message, context)
      // eslint-disable-next-line no-fallthrough
      case LogLevel.ERROR:
        this.error = (message, context) =>
          this._write(LogLevel.ERROR, message, context)
        break
    }
  }

  /**
   * Set all statements besides fatal to the NO_OP_LOGGER
   */
  private _reset(): void {
    this.debug = NO_OP_LOGGER
    this.info = NO_OP_LOGGER
    this.warn = NO_OP_LOGGER
    this.error = NO_OP_LOGGER
  }

  private _write(level: LogLevel, message: string, context?: unknown): void {
    this._writer.log({
      source: this.name,
      timestamp: HiResClock.timestamp(),
      message,
      level,
      context,
    })
  }
}

/**
 * Levels to strings
 */
const ReadableLogLevels = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
} as const

/**
 * Attempts to update the global logging levels
 *
 * @param level The new {@link LogLevel} to set globally
 */
export function setGlobalLogLevel(level: LogLevel): void {
  GLOBAL_LOGGER.setLevel(level)
}

/**
 * Allows customization of the global logger
 *
 * @param logger The {@link Logger} to use for global operations
 */
export function setGlobalLogger(logger: Logger): void {
  GLOBAL_LOGGER = logger
}

export function debug(message: string, context?: unknown): void {
  GLOBAL_LOGGER.debug(message, context)
}

export function info(message: string, context?: unknown): void {
  GLOBAL_LOGGER.info(message, context)
}

export function warn(message: string, context?: unknown): void {
  GLOBAL_LOGGER.warn(message, context)
}

export function error(message: string, context?: unknown): void {
  GLOBAL_LOGGER.error(message, context)
}

export function fatal(message: string, context?: unknown): void {
  GLOBAL_LOGGER.fatal(message, context)
}

let GLOBAL_LOGGER: Logger = new DefaultLogger({
  name: "global",
  writer: NoopLogWriter,
})
