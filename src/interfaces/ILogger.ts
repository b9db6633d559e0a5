/**
 * Logger Interface
 *
 * Application code logs through this interface; LoggerFactory picks the
 * adapter (console or CloudWatch-formatted JSON) from LOGGER_TYPE.
 */

/**
 * Structured data attached to a log entry
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /** Diagnostic detail: SQL timings, pool events */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /** Normal operations: "Request to create an Account" */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /** Recoverable problems worth a look */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /** Failed operations and caught exceptions */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /** Unrecoverable errors that stop the process */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

export interface ILoggerFactory {
  /**
   * @param context - Logger name, e.g. "AccountService"
   */
  createLogger(context?: string): ILogger;
}
