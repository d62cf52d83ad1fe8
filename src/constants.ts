/**
 * Literal prefix marking an environment value as a Parameter Store reference.
 * Everything after it, verbatim, is the parameter name.
 */
export const SSM_PREFIX = 'ssm://';

/**
 * Dependency injection token for the resolved environment provider.
 * Used internally to inject the resolved mapping into the service.
 */
export const SSM_ENV_PROVIDER = 'SSM_ENV_PROVIDER';

/**
 * Dependency injection token for the `KEY=VALUE` entries captured from the
 * configured environment at startup, before any resolution.
 */
export const SSM_ENV_SOURCE = 'SSM_ENV_SOURCE';

/**
 * Dependency injection token for the effective module options.
 */
export const SSM_ENV_CONFIG = 'SSM_ENV_CONFIG';

/**
 * Configuration key for AWS region in ConfigService.
 * Expected value: AWS region string (e.g., 'us-east-1', 'eu-west-1')
 */
export const AWS_REGION = 'ssm-env.awsRegion';

/**
 * Configuration key for the overwrite flag in ConfigService.
 * Expected value: Boolean indicating whether resolved values are written back
 * into the process environment
 */
export const SSM_ENV_OVERWRITE_ENVIRONMENT = 'ssm-env.overwriteEnvironment';

/**
 * Configuration key for the fetch deadline in ConfigService.
 * Expected value: Number of milliseconds (or a numeric string)
 */
export const SSM_ENV_TIMEOUT_MS = 'ssm-env.timeoutMs';

/**
 * Configuration key for parameter logging flag in ConfigService.
 * When enabled, resolved keys and masked values are logged at debug level.
 */
export const SSM_ENV_ENABLE_LOGGING = 'ssm-env.enableParameterLogging';
