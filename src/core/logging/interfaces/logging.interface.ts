export type LogMetadata = Record<string, unknown>;

export interface LoggingServiceInterface {
  log(message: unknown, context?: string, metadata?: LogMetadata): void;
  error(message: unknown, error?: Error | string, context?: string, metadata?: LogMetadata): void;
  warn(message: unknown, context?: string, metadata?: LogMetadata): void;
  debug(message: unknown, context?: string, metadata?: LogMetadata): void;
  verbose(message: unknown, context?: string, metadata?: LogMetadata): void;
  fatal(message: unknown, error?: Error, context?: string, metadata?: LogMetadata): void;

  logSecurityEvent(event: string, data?: LogMetadata): void;
}
