import { NestFastifyApplication } from "@nestjs/platform-fastify";
import { CorsHook } from "../core/cors/hooks/cors.hook";
import { CorsService } from "../core/cors/services/cors.service";

/**
 * Installs the CORS decision as an `onRequest` hook, ahead of routing.
 * Must be called before the application is initialised.
 *
 * @param app - The NestFastify application instance
 */
export function configureCors(app: NestFastifyApplication): void {
  app.get(CorsService).validateConfiguration();

  const corsHook = app.get(CorsHook);
  app.getHttpAdapter().getInstance().addHook("onRequest", corsHook.handle);
}
