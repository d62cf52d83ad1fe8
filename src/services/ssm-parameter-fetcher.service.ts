import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  GetParametersCommand,
  GetParametersCommandInput,
  SSMClient,
  SSMClientConfig,
} from '@aws-sdk/client-ssm';
import { SSM_ENV_CONFIG } from '../constants';
import {
  ModuleOptions,
  ParameterFetcher,
  ParameterFetchOptions,
  ParameterFetchResult,
} from '../interface';
import { SsmEnvUtil } from '../utils/ssm-env.util';

/**
 * Injectable {@link ParameterFetcher} backed by AWS Systems Manager Parameter Store.
 *
 * Each call sends exactly one GetParameters request over a single SSM client,
 * created on first use and destroyed with the module. Failures are logged with
 * remediation guidance and rethrown unchanged; retries are left to the SDK
 * client's own retry strategy.
 *
 * @example
 * ```typescript
 * const fetcher = new SsmParameterFetcherService({ awsRegion: 'us-east-1' });
 * const env = await replacedEnv(fetcher, ['DB_PASSWORD=ssm://prod/db/password']);
 * ```
 */
@Injectable()
export class SsmParameterFetcherService
  implements ParameterFetcher, OnModuleDestroy
{
  private readonly logger = new Logger(SsmParameterFetcherService.name);
  private ssmClient?: SSMClient;

  constructor(
    @Inject(SSM_ENV_CONFIG) private readonly config: ModuleOptions,
  ) {}

  onModuleDestroy(): void {
    this.ssmClient?.destroy();
    this.ssmClient = undefined;
  }

  private get client(): SSMClient {
    if (!this.ssmClient) {
      const clientConfiguration: SSMClientConfig = {
        ...(this.config.awsRegion ? { region: this.config.awsRegion } : {}),
      };
      this.ssmClient = new SSMClient(clientConfiguration);
    }
    return this.ssmClient;
  }

  async getParameters(
    input: GetParametersCommandInput,
    options: ParameterFetchOptions = {},
  ): Promise<ParameterFetchResult> {
    this.logger.debug(
      `Requesting ${input.Names?.length ?? 0} parameter(s) from AWS SSM`,
    );

    try {
      const result = await this.client.send(new GetParametersCommand(input), {
        abortSignal: options.abortSignal,
      });
      this.logger.debug(
        `Retrieved ${result.Parameters?.length ?? 0} parameter(s), ` +
          `${result.InvalidParameters?.length ?? 0} invalid`,
      );
      return result;
    } catch (error) {
      this.logger.error(
        SsmEnvUtil.buildErrorMessage(error, this.config.awsRegion),
      );
      throw error;
    }
  }
}
