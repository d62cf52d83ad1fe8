import { Logger } from '@nestjs/common';
import { SSM_PREFIX } from './constants';
import {
  GetParametersError,
  InvalidEnvVarFormatError,
  InvalidParametersError,
  NullParameterError,
  ParameterNotFoundError,
} from './errors/ssm-env.errors';
import {
  ParameterFetcher,
  ParameterFetchOptions,
  ParameterFetchResult,
  ResolvedEnv,
} from './interface';

const logger = new Logger('SsmEnv');

/**
 * Replace `ssm://` references in a list of environment entries with their
 * Parameter Store values.
 *
 * Every entry is recorded in the result (a repeated key keeps its last
 * value). Values starting with `ssm://` are resolved with a single batched,
 * decrypted GetParameters call; the rest of the value, verbatim, is the
 * parameter name. When no value carries the prefix, the fetcher is never
 * called.
 *
 * @param fetcher - Batched Parameter Store capability
 * @param envs - Entries in `KEY=VALUE` form, as produced from `process.env`
 * @param options - `abortSignal` cancels the fetch
 * @returns The resolved mapping
 * @throws InvalidEnvVarFormatError if an entry has no `=`
 * @throws GetParametersError if the fetch rejects
 * @throws InvalidParametersError if Parameter Store reports invalid names
 * @throws NullParameterError if a returned parameter lacks a name or value
 * @throws ParameterNotFoundError if a requested parameter is not returned
 *
 * @example
 * ```typescript
 * const env = await replacedEnv(fetcher, ['A=1', 'B=ssm://path/to/x']);
 * // { A: '1', B: '<value of path/to/x>' }
 * ```
 */
export async function replacedEnv(
  fetcher: ParameterFetcher,
  envs: readonly string[],
  options: ParameterFetchOptions = {},
): Promise<ResolvedEnv> {
  const orig = new Map<string, string>();
  const ssmKeys = new Set<string>();

  for (const env of envs) {
    const separator = env.indexOf('=');
    if (separator === -1) {
      throw new InvalidEnvVarFormatError(env);
    }
    const key = env.slice(0, separator);
    const value = env.slice(separator + 1);
    orig.set(key, value);

    if (value.startsWith(SSM_PREFIX)) {
      ssmKeys.add(value.slice(SSM_PREFIX.length));
    }
  }

  if (ssmKeys.size === 0) {
    return Object.fromEntries(orig);
  }

  const keys = [...ssmKeys];
  logger.log(`Fetching SSM parameters - Keys: ${keys.join(',')}`);
  const parameters = await batchFetch(fetcher, keys, options);

  // Resolve per entry: two variables may reference the same parameter.
  for (const [key, value] of orig) {
    if (!value.startsWith(SSM_PREFIX)) continue;

    const parameterKey = value.slice(SSM_PREFIX.length);
    const resolved = parameters.get(parameterKey);
    if (resolved === undefined) {
      throw new ParameterNotFoundError(parameterKey);
    }
    orig.set(key, resolved);
  }

  return Object.fromEntries(orig);
}

/**
 * Fetch all names in one decrypted GetParameters call and index the result
 * by parameter name.
 */
export async function batchFetch(
  fetcher: ParameterFetcher,
  names: string[],
  options: ParameterFetchOptions = {},
): Promise<Map<string, string>> {
  let response: ParameterFetchResult;
  try {
    response = await fetcher.getParameters(
      { Names: names, WithDecryption: true },
      options,
    );
  } catch (error) {
    throw new GetParametersError(error);
  }

  const invalidParameters = response.InvalidParameters ?? [];
  if (invalidParameters.length > 0) {
    throw new InvalidParametersError(invalidParameters);
  }

  const parameters = new Map<string, string>();
  for (const parameter of response.Parameters ?? []) {
    if (parameter.Name === undefined || parameter.Value === undefined) {
      throw new NullParameterError();
    }
    parameters.set(parameter.Name, parameter.Value);
  }
  return parameters;
}
