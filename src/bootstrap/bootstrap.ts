import "reflect-metadata";

import { INestApplicationContext } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { HttpExceptionFilter } from "../common/filters/http-exception.filter";
import { BaseConfigInterface, ConfigApiInterface } from "../config";
import { AppLoggingService } from "../core/logging/services/logging.service";
import { createAppModule } from "./app.module.factory";
import { BootstrapOptions } from "./bootstrap.options";
import { configureCors } from "./cors.setup";
import { defaultFastifyOptions } from "./defaults";

/**
 * Bootstrap the application.
 *
 * - Creates the Fastify based Nest application
 * - Installs logging, the exception filter and the CORS hook
 * - Sets up graceful shutdown handlers
 *
 * A CORS configuration error stops the process with exit code 1.
 *
 * @example
 * ```typescript
 * // main.ts
 * import { bootstrap } from "nestjs-cors-gate";
 * import { FeaturesModule } from "./features/features.module";
 *
 * bootstrap({ appModules: [FeaturesModule] });
 * ```
 */
export async function bootstrap(options: BootstrapOptions): Promise<void> {
  try {
    const app = await createApplication(options);

    const configService = app.get(ConfigService<BaseConfigInterface>);
    const loggingService = app.get(AppLoggingService);

    const port = configService.get<ConfigApiInterface>("api")?.port ?? 3000;
    await app.listen(port, "0.0.0.0");

    console.info(`API server started on port ${port}`);
    loggingService.log(`API server started on port ${port}`);

    setupGracefulShutdown(app);
  } catch (error) {
    console.error("Failed to start application:", error);
    process.exit(1);
  }
}

/**
 * Creates and configures the application without listening.
 */
export async function createApplication(options: BootstrapOptions): Promise<NestFastifyApplication> {
  const AppModule = createAppModule(options);

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.forRoot(),
    new FastifyAdapter(defaultFastifyOptions),
    { logger: ["error", "warn"], abortOnError: false },
  );

  const loggingService = app.get(AppLoggingService);
  app.useLogger(loggingService);
  app.useGlobalFilters(new HttpExceptionFilter(loggingService));

  configureCors(app);

  return app;
}

function setupGracefulShutdown(app: INestApplicationContext): void {
  const shutdown = async (signal: string) => {
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      console.error(`Error during ${signal} shutdown:`, error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
