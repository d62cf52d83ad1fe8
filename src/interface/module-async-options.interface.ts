import { ModuleMetadata, Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Async configuration options for SsmEnvModule.
 *
 * Allows configuration of the module using NestJS ConfigService,
 * which is useful for environment-based or dynamic configuration.
 *
 * The ConfigService should provide values for the following keys:
 * - `ssm-env.awsRegion`: AWS region (string, optional)
 * - `ssm-env.overwriteEnvironment`: Write resolved values into process.env (boolean, optional)
 * - `ssm-env.timeoutMs`: Fetch deadline in milliseconds (number, optional)
 * - `ssm-env.enableParameterLogging`: Debug-log resolved variables (boolean, optional)
 *
 * @example
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
export interface ModuleAsyncOptions {
  /**
   * Modules that export the ConfigService, typically `ConfigModule.forRoot()`.
   */
  imports?: ModuleMetadata['imports'];

  /**
   * The ConfigService class to use for retrieving configuration values.
   */
  useClass: Type<ConfigService>;
}
