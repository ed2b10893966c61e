import { BaseConfigInterface } from "./interfaces/base.config.interface";

/**
 * Options for createBaseConfig
 */
export interface BaseConfigOptions {
  /**
   * Application name used in logging labels
   * @default 'nestjs-app'
   */
  appName?: string;

  /**
   * Environment to read from instead of `process.env`
   */
  env?: NodeJS.ProcessEnv;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return parseInt(value);
}

/**
 * Creates the base configuration object from environment variables.
 *
 * CORS defaults allow every origin with credentials, the common verbs and the
 * `Origin`, `Authorization` and `Content-Type` request headers, with a one
 * minute preflight cache. Setting `CORS_ORIGINS` to an empty string is a
 * configuration error raised when the CORS module is built.
 *
 * @example
 * ```typescript
 * ConfigModule.forRoot({
 *   isGlobal: true,
 *   load: [() => createBaseConfig({ appName: 'my-app' })],
 * })
 * ```
 */
export function createBaseConfig(options?: BaseConfigOptions): BaseConfigInterface {
  const env = options?.env ?? process.env;
  const appName = options?.appName || "nestjs-app";

  return {
    api: {
      port: parseInt(env.API_PORT || "3000"),
      env: env.ENV || "development",
    },
    cors: {
      origins: env.CORS_ORIGINS ?? "*",
      methods: env.CORS_METHODS ?? "GET, PUT, POST, DELETE",
      requestHeaders: env.CORS_REQUEST_HEADERS ?? "Origin, Authorization, Content-Type",
      exposedHeaders: env.CORS_EXPOSED_HEADERS ?? "",
      maxAge: parseInt(env.CORS_MAX_AGE_MS || "60000"),
      credentials: env.CORS_CREDENTIALS !== "false",
      validateHeaders: env.CORS_VALIDATE_HEADERS === "true",
      rejectStatus: parseOptionalInt(env.CORS_REJECT_STATUS),
      logViolations: env.CORS_LOG_VIOLATIONS !== "false",
    },
    logging: {
      level: env.LOG_LEVEL || "trace",
      console: env.CONSOLE_ENABLED === "true",
      loki: {
        enabled: env.LOKI_ENABLED === "true",
        host: env.LOKI_HOST || "http://localhost:3100",
        batching: env.LOKI_BATCHING !== "false",
        interval: parseInt(env.LOKI_INTERVAL || "30"),
        labels: {
          application: env.LOKI_APP_LABEL || appName,
          environment: env.ENV || "development",
        },
      },
    },
  };
}

/**
 * Pre-configured base configuration instance built from `process.env`.
 */
export const baseConfig = createBaseConfig();
