import {
  DynamicModule,
  Global,
  InjectionToken,
  Module,
  ModuleMetadata,
  OptionalFactoryDependency,
  Provider,
} from "@nestjs/common";
import { baseConfig } from "../../config/base.config";
import { CORS_OPTIONS, CORS_POLICY, CORS_REJECT_HANDLER } from "./constants/cors.constants";
import { createCorsPolicy } from "./factories/cors.policy.factory";
import { CorsHook } from "./hooks/cors.hook";
import { CorsModuleOptions, CorsRejectHandler } from "./interfaces/cors.module.options.interface";
import { CorsPolicy } from "./interfaces/cors.policy.interface";
import { CorsService } from "./services/cors.service";

export interface CorsModuleAsyncOptions {
  imports?: ModuleMetadata["imports"];
  useFactory: (...args: any[]) => Promise<CorsModuleOptions> | CorsModuleOptions;
  inject?: (InjectionToken | OptionalFactoryDependency)[];
}

const CORS_SERVICES = [CorsService, CorsHook];

function resolvePolicy(options: CorsModuleOptions): CorsPolicy {
  const { onReject: _onReject, ...overrides } = options;
  return createCorsPolicy({ ...baseConfig.cors, ...overrides });
}

@Global()
@Module({})
export class CorsModule {
  /**
   * Options override the environment configuration. The policy is built
   * here, so an invalid configuration throws before the application exists.
   */
  static forRoot(options: CorsModuleOptions = {}): DynamicModule {
    const policy = resolvePolicy(options);

    return {
      module: CorsModule,
      providers: [
        { provide: CORS_POLICY, useValue: policy },
        { provide: CORS_REJECT_HANDLER, useValue: options.onReject ?? null },
        ...CORS_SERVICES,
      ],
      exports: [CORS_POLICY, ...CORS_SERVICES],
      global: true,
    };
  }

  static forRootAsync(options: CorsModuleAsyncOptions): DynamicModule {
    const providers: Provider[] = [
      {
        provide: CORS_OPTIONS,
        useFactory: options.useFactory,
        inject: options.inject || [],
      },
      {
        provide: CORS_POLICY,
        useFactory: (corsOptions: CorsModuleOptions) => resolvePolicy(corsOptions),
        inject: [CORS_OPTIONS],
      },
      {
        provide: CORS_REJECT_HANDLER,
        useFactory: (corsOptions: CorsModuleOptions): CorsRejectHandler | null => corsOptions.onReject ?? null,
        inject: [CORS_OPTIONS],
      },
      ...CORS_SERVICES,
    ];

    return {
      module: CorsModule,
      imports: options.imports || [],
      providers,
      exports: [CORS_POLICY, ...CORS_SERVICES],
      global: true,
    };
  }
}
