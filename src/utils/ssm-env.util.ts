import { ParameterFetchOptions } from '../interface';

type AwsishError = {
  name?: unknown;
  code?: unknown;
  message?: unknown;
};

const field = (error: unknown, key: keyof AwsishError): string | undefined => {
  if (!error || typeof error !== 'object') return undefined;
  const value = (error as AwsishError)[key];
  return typeof value === 'string' ? value : undefined;
};

/**
 * Utility class for `ssm://` environment resolution.
 * Provides configuration parsing, environment enumeration and logging helpers.
 */
export class SsmEnvUtil {
  /**
   * List of sensitive keywords that should be masked in logs.
   * Variables containing these keywords will have their values hidden.
   */
  private static readonly sensitiveKeywords = [
    'password',
    'passwd',
    'pwd',
    'secret',
    'key',
    'token',
    'auth',
    'credential',
    'private',
    'salt',
  ];

  /**
   * Parse a configuration value as boolean.
   * Handles both boolean and string values from ConfigService.
   *
   * @example
   * ```typescript
   * SsmEnvUtil.parseBoolean(true); // true
   * SsmEnvUtil.parseBoolean('TRUE'); // true
   * SsmEnvUtil.parseBoolean('anything'); // false
   * ```
   */
  static parseBoolean(value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return false;
  }

  /**
   * Parse a configuration value as a non-negative number.
   *
   * @returns The number, or undefined when the value is absent or empty
   * @throws Error if the value is present but not a non-negative number
   */
  static parseOptionalNumber(value: unknown, name: string): number | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new Error(
        `${name} must be a non-negative number. Received: '${String(value)}'`,
      );
    }
    return parsed;
  }

  /**
   * Determines if a variable name should have its value masked in logs.
   *
   * @example
   * ```typescript
   * SsmEnvUtil.shouldMaskValue('DB_PASSWORD'); // true
   * SsmEnvUtil.shouldMaskValue('DB_HOST'); // false
   * ```
   */
  static shouldMaskValue(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return this.sensitiveKeywords.some((keyword) => lowerKey.includes(keyword));
  }

  /**
   * Masks a sensitive value for safe logging.
   *
   * @example
   * ```typescript
   * SsmEnvUtil.maskValue('my-secret-123', 'API_SECRET'); // '***MASKED***'
   * SsmEnvUtil.maskValue('localhost', 'DB_HOST'); // 'localhost'
   * ```
   */
  static maskValue(value: string, key: string): string {
    return this.shouldMaskValue(key) ? '***MASKED***' : value;
  }

  /**
   * Serialize an environment object into `KEY=VALUE` entries.
   * Variables whose value is undefined are skipped.
   *
   * @example
   * ```typescript
   * SsmEnvUtil.toEnvEntries({ A: '1', B: 'x=y' }); // ['A=1', 'B=x=y']
   * ```
   */
  static toEnvEntries(env: NodeJS.ProcessEnv): string[] {
    const entries: string[] = [];
    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined) entries.push(`${key}=${value}`);
    }
    return entries;
  }

  /**
   * Fetch options for an optional deadline in milliseconds.
   */
  static fetchOptions(timeoutMs?: number): ParameterFetchOptions {
    return timeoutMs === undefined
      ? {}
      : { abortSignal: AbortSignal.timeout(timeoutMs) };
  }

  /**
   * Builds a detailed error message based on the error type.
   * Provides context-specific guidance for common GetParameters failures.
   *
   * @param error - The caught error object
   * @param awsRegion - AWS region being accessed, if configured
   * @returns Formatted error message with context and remediation guidance
   */
  static buildErrorMessage(error: unknown, awsRegion?: string): string {
    const baseMessage = `Failed to fetch parameters from AWS SSM Parameter Store. Region: '${awsRegion ?? 'default'}'`;
    const name = field(error, 'name');
    const code = field(error, 'code');
    const message = field(error, 'message');

    if (name === 'AccessDeniedException') {
      return (
        `${baseMessage} - Access Denied. ` +
        `Ensure the IAM role/user has 'ssm:GetParameters' permission for the referenced parameters. ` +
        `Error: ${message}`
      );
    }

    if (name === 'InvalidKeyId') {
      return (
        `${baseMessage} - Decryption failed. ` +
        `Ensure the KMS key used by the SecureString parameters is enabled and usable by the caller. ` +
        `Error: ${message}`
      );
    }

    if (name === 'ThrottlingException') {
      return (
        `${baseMessage} - Request throttled. ` +
        `AWS SSM API rate limit exceeded. ` +
        `Error: ${message}`
      );
    }

    if (name === 'AbortError' || name === 'TimeoutError') {
      return `${baseMessage} - Request aborted before completion. Error: ${message}`;
    }

    if (code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
      return (
        `${baseMessage} - Network error. ` +
        `Unable to reach AWS SSM service. Check network connectivity and AWS service status. ` +
        `Error: ${message}`
      );
    }

    if (message?.includes('Missing credentials')) {
      return (
        `${baseMessage} - Missing AWS credentials. ` +
        `Configure credentials via environment variables, AWS credentials file, or IAM role. ` +
        `Error: ${message}`
      );
    }

    return `${baseMessage} - ${message || 'Unknown error occurred'}`;
  }
}
