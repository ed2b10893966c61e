import { Injectable, LoggerService } from "@nestjs/common";
import pino from "pino";
import pretty from "pino-pretty";
import { baseConfig } from "../../../config/base.config";
import { ConfigLoggingInterface } from "../../../config/interfaces/config.logging.interface";
import { LogMetadata, LoggingServiceInterface } from "../interfaces/logging.interface";

const prettyOptions = {
  colorize: true,
  translateTime: false,
  ignore: "pid,hostname",
  messageFormat: "{msg}",
  hideObject: true,
};

function isLevel(value: string): value is pino.Level {
  return value in pino.levels.values;
}

function formatMessage(message: unknown): string {
  return typeof message === "object" ? JSON.stringify(message) : String(message);
}

function withStack(message: unknown, error: Error): string {
  return `${formatMessage(message)}\nStack: ${error.stack}`;
}

@Injectable()
export class AppLoggingService implements LoggingServiceInterface, LoggerService {
  private readonly logger: pino.Logger;

  constructor() {
    this.logger = AppLoggingService.createLogger(baseConfig.logging);
  }

  private enrich(context?: string, metadata?: LogMetadata): LogMetadata {
    return { context, ...metadata };
  }

  log(message: unknown, context?: string, metadata?: LogMetadata): void {
    this.logger.info(this.enrich(context, metadata), formatMessage(message));
  }

  error(message: unknown, errorOrTrace?: Error | string, context?: string, metadata?: LogMetadata): void {
    if (errorOrTrace instanceof Error) {
      this.logger.error(
        this.enrich(context, { ...metadata, error: errorOrTrace.message, errorName: errorOrTrace.name }),
        withStack(message, errorOrTrace),
      );
      return;
    }

    // Nest's LoggerService passes a stack trace string
    this.logger.error(this.enrich(context, { ...metadata, trace: errorOrTrace }), formatMessage(message));
  }

  warn(message: unknown, context?: string, metadata?: LogMetadata): void {
    this.logger.warn(this.enrich(context, metadata), formatMessage(message));
  }

  debug(message: unknown, context?: string, metadata?: LogMetadata): void {
    this.logger.debug(this.enrich(context, metadata), formatMessage(message));
  }

  verbose(message: unknown, context?: string, metadata?: LogMetadata): void {
    this.logger.trace(this.enrich(context, metadata), formatMessage(message));
  }

  fatal(message: unknown, error?: Error, context?: string, metadata?: LogMetadata): void {
    const enriched = this.enrich(context, {
      ...metadata,
      ...(error && { error: error.message, errorName: error.name }),
    });

    this.logger.fatal(enriched, error ? withStack(message, error) : formatMessage(message));
  }

  logSecurityEvent(event: string, data?: LogMetadata): void {
    this.logger.warn(this.enrich("SECURITY", { ...data, securityEvent: true }), `Security Event: ${event}`);
  }

  private static createLogger(config: ConfigLoggingInterface): pino.Logger {
    if (config.loki.enabled && config.loki.host) {
      try {
        return AppLoggingService.createLokiLogger(config);
      } catch (error) {
        console.error(
          "Failed to initialize Loki transport, falling back to console logging:",
          error instanceof Error ? error.message : String(error),
        );
      }
    }

    return AppLoggingService.createConsoleLogger(config);
  }

  private static createLokiLogger(config: ConfigLoggingInterface): pino.Logger {
    const targets: pino.TransportTargetOptions[] = [
      {
        target: "pino-loki",
        level: config.level,
        options: {
          host: config.loki.host,
          batching: config.loki.batching,
          interval: config.loki.interval,
          labels: config.loki.labels,
        },
      },
    ];

    if (config.console) {
      targets.push({ target: "pino-pretty", level: config.level, options: prettyOptions });
    }

    return pino({ level: config.level }, pino.transport({ targets }));
  }

  private static createConsoleLogger(config: ConfigLoggingInterface): pino.Logger {
    // Console output stays silent unless explicitly enabled
    const streams: pino.StreamEntry<pino.LevelWithSilent>[] = [
      {
        level: config.console && isLevel(config.level) ? config.level : "silent",
        stream: pretty(prettyOptions),
      },
    ];

    return pino(
      {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label: string) => ({ level: label }),
        },
      },
      pino.multistream(streams),
    );
  }
}

