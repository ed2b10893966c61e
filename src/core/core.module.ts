import { DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { BaseConfigInterface, ConfigCorsInterface } from "../config/interfaces";

import { CorsModule } from "./cors/cors.module";
import { CorsModuleOptions } from "./cors/interfaces/cors.module.options.interface";
import { LoggingModule } from "./logging/logging.module";

/**
 * Options for CoreModule.forRoot()
 */
export interface CoreModuleOptions {
  /**
   * CORS settings applied over the `cors` section loaded by ConfigModule,
   * including an optional handler for rejected requests.
   */
  cors?: CorsModuleOptions;
}

/**
 * Infrastructure shared by every application: logging and CORS.
 *
 * Expects a global ConfigModule loaded with `createBaseConfig()`.
 */
@Global()
@Module({})
export class CoreModule {
  static forRoot(options: CoreModuleOptions = {}): DynamicModule {
    return {
      module: CoreModule,
      imports: [
        LoggingModule,
        CorsModule.forRootAsync({
          imports: [ConfigModule],
          inject: [ConfigService],
          useFactory: (configService: ConfigService<BaseConfigInterface>): CorsModuleOptions => ({
            ...configService.get<ConfigCorsInterface>("cors"),
            ...options.cors,
          }),
        }),
      ],
      exports: [LoggingModule, CorsModule],
      global: true,
    };
  }
}
