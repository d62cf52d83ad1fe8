/**
 * Configuration options for the SsmEnvModule.
 *
 * These options control which environment is resolved at bootstrap and how
 * the Parameter Store client is set up.
 *
 * @example
 * Basic configuration:
 * ```typescript
 * {
 *   awsRegion: 'us-east-1'
 * }
 * ```
 *
 * @example
 * Export resolved values to `process.env` with a five second deadline:
 * ```typescript
 * {
 *   awsRegion: 'us-east-1',
 *   overwriteEnvironment: true,
 *   timeoutMs: 5000
 * }
 * ```
 */
export interface ModuleOptions {
  /**
   * AWS region of the Parameter Store holding the referenced parameters.
   * When omitted, the AWS SDK default region chain applies.
   *
   * @example 'us-east-1', 'eu-west-1', 'ap-south-1'
   */
  awsRegion?: string;

  /**
   * Environment whose `ssm://` references are resolved.
   *
   * @default process.env
   */
  environment?: NodeJS.ProcessEnv;

  /**
   * Whether to write resolved values back into `environment`, so that code
   * reading `process.env` directly sees the secrets.
   *
   * @default false
   */
  overwriteEnvironment?: boolean;

  /**
   * Deadline in milliseconds for the GetParameters call. No deadline when
   * omitted.
   */
  timeoutMs?: number;

  /**
   * Whether to enable debug logging of resolved variables.
   * Sensitive values (passwords, secrets, keys, tokens) are automatically masked.
   *
   * @default false
   */
  enableParameterLogging?: boolean;
}
