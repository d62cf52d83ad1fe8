import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SSM_ENV_CONFIG,
  SSM_ENV_PROVIDER,
  SSM_ENV_SOURCE,
  SSM_PREFIX,
} from './constants';
import { ModuleOptions, ParameterFetcher, ResolvedEnv } from './interface';
import { SsmParameterFetcherService } from './services';
import { replacedEnv } from './ssm-env';
import { SsmEnvUtil } from './utils/ssm-env.util';

/**
 * Resolve the entries captured from the configured environment and, when
 * requested, write the resolved secrets back into that environment.
 *
 * Shared by the module's bootstrap provider and {@link SsmEnvService.refresh}.
 */
export async function resolveEnvironment(
  fetcher: ParameterFetcher,
  config: ModuleOptions,
  entries: readonly string[],
): Promise<ResolvedEnv> {
  const resolved = await replacedEnv(
    fetcher,
    entries,
    SsmEnvUtil.fetchOptions(config.timeoutMs),
  );

  if (config.overwriteEnvironment) {
    const environment = config.environment ?? process.env;
    for (const key of referencedKeys(entries)) {
      environment[key] = resolved[key];
    }
  }
  return resolved;
}

/**
 * Keys whose final entry carries an `ssm://` reference. Plain variables are
 * left to the application.
 */
const referencedKeys = (entries: readonly string[]): string[] => {
  const referenced = new Map<string, boolean>();
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator === -1) continue;
    referenced.set(
      entry.slice(0, separator),
      entry.slice(separator + 1).startsWith(SSM_PREFIX),
    );
  }
  return [...referenced]
    .filter(([, isReference]) => isReference)
    .map(([key]) => key);
};

/**
 * Service for reading environment variables after their `ssm://`
 * references have been resolved against AWS Systems Manager Parameter Store.
 *
 * The environment is captured and resolved once at application startup;
 * `refresh()` resolves the captured entries again on demand.
 *
 * @example
 * ```typescript
 * constructor(private readonly ssmEnv: SsmEnvService) {
 *   // DB_PASSWORD=ssm://prod/db/password in the process environment
 *   const password = this.ssmEnv.get('DB_PASSWORD');
 *
 *   const port = this.ssmEnv.getAsNumber('DB_PORT');
 *   const debug = this.ssmEnv.getAsBoolean('DEBUG');
 * }
 * ```
 */
@Injectable()
export class SsmEnvService {
  private readonly logger = new Logger(SsmEnvService.name);
  private _env: ResolvedEnv = {};

  constructor(
    @Inject(SSM_ENV_PROVIDER) resolvedEnv: ResolvedEnv,
    @Inject(SSM_ENV_CONFIG) private readonly config: ModuleOptions,
    @Inject(SSM_ENV_SOURCE) private readonly source: string[],
    private readonly fetcher: SsmParameterFetcherService,
  ) {
    this.load(resolvedEnv);
  }

  private load(resolvedEnv: ResolvedEnv): void {
    this._env = { ...resolvedEnv };

    if (this.config.enableParameterLogging) {
      for (const [key, value] of Object.entries(this._env)) {
        this.logger.debug(
          `Resolved variable: ${key} = ${SsmEnvUtil.maskValue(value, key)}`,
        );
      }
      this.logger.log(
        `Loaded ${Object.keys(this._env).length} variable(s) into service`,
      );
    }
  }

  /**
   * Retrieve a resolved variable.
   *
   * @returns The value, or undefined if the variable is not set
   */
  get(key: string): string | undefined {
    return this.has(key) ? this._env[key] : undefined;
  }

  /**
   * Get variable value with fallback default
   */
  getOrDefault(key: string, defaultValue: string): string {
    return this.get(key) ?? defaultValue;
  }

  /**
   * Retrieve a variable and convert it to a number.
   *
   * @returns The value converted to a number, or NaN if conversion fails or key not found
   */
  getAsNumber(key: string): number {
    const value = this.get(key);
    return value ? +value : NaN;
  }

  /**
   * Parse variable as boolean (`true`, `1` and `yes` are truthy)
   */
  getAsBoolean(key: string): boolean {
    const value = this.get(key)?.toLowerCase();
    return value === 'true' || value === '1' || value === 'yes';
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this._env, key);
  }

  getAllKeys(): string[] {
    return Object.keys(this._env);
  }

  /**
   * Get all resolved variables
   * @returns Copy of the resolved mapping
   */
  getAll(): ResolvedEnv {
    return { ...this._env };
  }

  /**
   * Resolve arbitrary `KEY=VALUE` entries with the module's fetcher.
   * Does not touch the mapping held by the service.
   */
  async resolve(envs: readonly string[]): Promise<ResolvedEnv> {
    return replacedEnv(
      this.fetcher,
      envs,
      SsmEnvUtil.fetchOptions(this.config.timeoutMs),
    );
  }

  /**
   * Resolve the entries captured at startup again (picking up rotated
   * parameter values) and replace the held mapping.
   * On failure the previous mapping is kept and the error is rethrown.
   */
  async refresh(): Promise<void> {
    const resolved = await resolveEnvironment(
      this.fetcher,
      this.config,
      this.source,
    );
    this.load(resolved);
  }
}
