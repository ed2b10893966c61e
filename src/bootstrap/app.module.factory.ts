import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { baseConfig } from "../config/base.config";
import { CoreModule } from "../core/core.module";
import { BootstrapOptions } from "./bootstrap.options";

export interface GeneratedAppModuleType {
  forRoot(): DynamicModule;
}

/**
 * Creates a dynamic AppModule based on bootstrap options.
 *
 * The generated module wires:
 * - Global configuration module
 * - Library's CoreModule (logging and CORS)
 * - User's app-specific modules
 */
export function createAppModule(options: BootstrapOptions): GeneratedAppModuleType {
  @Module({})
  class GeneratedAppModule {
    static forRoot(): DynamicModule {
      const configLoader = options.config
        ? () => ({ ...baseConfig, ...options.config?.() })
        : () => baseConfig;

      return {
        module: GeneratedAppModule,
        imports: [
          ConfigModule.forRoot({
            load: [configLoader],
            isGlobal: true,
            cache: true,
          }),

          CoreModule.forRoot({ cors: options.cors }),

          ...options.appModules,
        ],
        global: true,
      };
    }
  }

  return GeneratedAppModule;
}
