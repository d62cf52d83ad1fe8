import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AWS_REGION,
  SSM_ENV_CONFIG,
  SSM_ENV_ENABLE_LOGGING,
  SSM_ENV_OVERWRITE_ENVIRONMENT,
  SSM_ENV_PROVIDER,
  SSM_ENV_SOURCE,
  SSM_ENV_TIMEOUT_MS,
} from './constants';
import { ModuleAsyncOptions, ModuleOptions, ResolvedEnv } from './interface';
import { SsmParameterFetcherService } from './services';
import { resolveEnvironment, SsmEnvService } from './ssm-env.service';
import { SsmEnvUtil } from './utils/ssm-env.util';

/**
 * Global NestJS module resolving `ssm://` environment references against
 * AWS Systems Manager Parameter Store.
 *
 * At application startup the module captures the environment (default
 * `process.env`), fetches every referenced parameter in one decrypted
 * GetParameters call and makes the resolved variables available through
 * the SsmEnvService. Any resolution error aborts startup.
 *
 * @example
 * Static registration:
 * ```typescript
 * // DB_PASSWORD=ssm://prod/db/password
 * @Module({
 *   imports: [
 *     SsmEnvModule.register({
 *       awsRegion: 'us-east-1',
 *       overwriteEnvironment: true,
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 *
 * @example
 * Async registration with ConfigService:
 * ```typescript
 * @Module({
 *   imports: [
 *     SsmEnvModule.registerAsync({
 *       imports: [ConfigModule.forRoot({ load: [ssmEnvConfig] })],
 *       useClass: ConfigService,
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 */
@Global()
@Module({})
export class SsmEnvModule {
  /**
   * Register the module with static configuration.
   */
  public static register(moduleOptions: ModuleOptions = {}): DynamicModule {
    return {
      module: SsmEnvModule,
      providers: [
        SsmEnvService,
        SsmParameterFetcherService,
        { provide: SSM_ENV_CONFIG, useValue: moduleOptions },
        ...this.createProviders(),
      ],
      exports: [SsmEnvService, SsmParameterFetcherService],
    };
  }

  /**
   * Register the module with async configuration using ConfigService.
   *
   * @example
   * ```typescript
   * // ssm-env.awsRegion=us-east-1
   * // ssm-env.overwriteEnvironment=true
   * // ssm-env.timeoutMs=5000
   *
   * SsmEnvModule.registerAsync({
   *   imports: [ConfigModule.forRoot({ load: [ssmEnvConfig] })],
   *   useClass: ConfigService,
   * })
   * ```
   */
  public static registerAsync(
    moduleAsyncOptions: ModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: SsmEnvModule,
      imports: moduleAsyncOptions.imports ?? [],
      providers: [
        SsmEnvService,
        SsmParameterFetcherService,
        {
          provide: SSM_ENV_CONFIG,
          useFactory: (configService: ConfigService): ModuleOptions => {
            const awsRegion = configService.get<string>(AWS_REGION);
            return {
              ...(awsRegion ? { awsRegion } : {}),
              overwriteEnvironment: SsmEnvUtil.parseBoolean(
                configService.get(SSM_ENV_OVERWRITE_ENVIRONMENT),
              ),
              timeoutMs: SsmEnvUtil.parseOptionalNumber(
                configService.get(SSM_ENV_TIMEOUT_MS),
                SSM_ENV_TIMEOUT_MS,
              ),
              enableParameterLogging: SsmEnvUtil.parseBoolean(
                configService.get(SSM_ENV_ENABLE_LOGGING),
              ),
            };
          },
          inject: [moduleAsyncOptions.useClass],
        },
        ...this.createProviders(),
      ],
      exports: [SsmEnvService, SsmParameterFetcherService],
    };
  }

  private static createProviders(): Provider[] {
    return [
      {
        provide: SSM_ENV_SOURCE,
        useFactory: (config: ModuleOptions): string[] =>
          SsmEnvUtil.toEnvEntries(config.environment ?? process.env),
        inject: [SSM_ENV_CONFIG],
      },
      {
        provide: SSM_ENV_PROVIDER,
        useFactory: async (
          fetcher: SsmParameterFetcherService,
          config: ModuleOptions,
          entries: string[],
        ): Promise<ResolvedEnv> => {
          return await resolveEnvironment(fetcher, config, entries);
        },
        inject: [SsmParameterFetcherService, SSM_ENV_CONFIG, SSM_ENV_SOURCE],
      },
    ];
  }
}
