import { DynamicModule, Type } from "@nestjs/common";
import { BaseConfigInterface } from "../config/interfaces";
import { CorsModuleOptions } from "../core/cors/interfaces/cors.module.options.interface";

/**
 * Options for the bootstrap function
 */
export interface BootstrapOptions {
  /**
   * App-specific feature modules to import.
   * Their controllers are the handlers CORS forwards to.
   */
  appModules: (Type<unknown> | DynamicModule)[];

  /**
   * Custom configuration loader merged over the environment based config.
   */
  config?: () => Partial<BaseConfigInterface>;

  /**
   * CORS overrides applied over the loaded `cors` section, and an optional
   * handler for rejected requests.
   *
   * @example
   * ```typescript
   * cors: {
   *   onReject: (_request, reply) => reply.code(403).send({ message: "Origin not allowed" }),
   * }
   * ```
   */
  cors?: CorsModuleOptions;
}
