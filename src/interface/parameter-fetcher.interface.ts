import type {
  GetParametersCommandInput,
  GetParametersCommandOutput,
} from '@aws-sdk/client-ssm';

/**
 * The part of a GetParameters response the resolver reads.
 */
export type ParameterFetchResult = Pick<
  GetParametersCommandOutput,
  'Parameters' | 'InvalidParameters'
>;

/**
 * Per-call options forwarded to the fetch.
 */
export interface ParameterFetchOptions {
  /**
   * Cancels the in-flight request. Use `AbortSignal.timeout(ms)` for a
   * deadline.
   */
  abortSignal?: AbortSignal;
}

/**
 * Batched "get parameters by name" capability.
 *
 * {@link SsmParameterFetcherService} implements it over the AWS SDK; tests
 * substitute a plain object.
 *
 * @example
 * ```typescript
 * const fetcher: ParameterFetcher = {
 *   getParameters: async ({ Names = [] }) => ({
 *     Parameters: Names.map((Name) => ({ Name, Value: 'test-value' })),
 *     InvalidParameters: [],
 *   }),
 * };
 * ```
 */
export interface ParameterFetcher {
  getParameters(
    input: GetParametersCommandInput,
    options?: ParameterFetchOptions,
  ): Promise<ParameterFetchResult>;
}
