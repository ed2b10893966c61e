/**
 * Logging Module
 *
 * Provides structured logging with pino, with optional Loki shipping.
 */

export * from "./logging.module";
export { AppLoggingService } from "./services/logging.service";
export type { LogMetadata, LoggingServiceInterface } from "./interfaces/logging.interface";
