import 'reflect-metadata';

import { SsmEnvService, resolveEnvironment } from './ssm-env.service';
import { SsmEnvModule } from './ssm-env.module';
import { batchFetch, replacedEnv } from './ssm-env';
import {
  ModuleAsyncOptions,
  ModuleOptions,
  ParameterFetcher,
  ParameterFetchOptions,
  ParameterFetchResult,
  ResolvedEnv,
} from './interface';
import {
  SSM_ENV_CONFIG,
  SSM_ENV_PROVIDER,
  SSM_ENV_SOURCE,
  SSM_PREFIX,
} from './constants';
import { SsmParameterFetcherService } from './services';
import {
  GetParametersError,
  InvalidEnvVarFormatError,
  InvalidParametersError,
  isSsmEnvError,
  NullParameterError,
  ParameterNotFoundError,
  SsmEnvError,
  SsmEnvErrorKind,
  SsmEnvFailure,
} from './errors/ssm-env.errors';

export {
  SSM_ENV_CONFIG,
  SSM_ENV_PROVIDER,
  SSM_ENV_SOURCE,
  SSM_PREFIX,
  SsmEnvService,
  SsmEnvModule,
  SsmParameterFetcherService,
  replacedEnv,
  batchFetch,
  resolveEnvironment,
  ModuleOptions,
  ModuleAsyncOptions,
  ParameterFetcher,
  ParameterFetchOptions,
  ParameterFetchResult,
  ResolvedEnv,
  SsmEnvError,
  SsmEnvErrorKind,
  SsmEnvFailure,
  GetParametersError,
  InvalidEnvVarFormatError,
  InvalidParametersError,
  NullParameterError,
  ParameterNotFoundError,
  isSsmEnvError,
};
