/**
 * Discriminant carried by every error raised while resolving `ssm://`
 * references.
 */
export type SsmEnvErrorKind =
  | 'InvalidEnvVarFormat'
  | 'GetParameters'
  | 'InvalidParameters'
  | 'NullParameter'
  | 'ParameterNotFound';

/**
 * Base class of the resolution errors. Use `kind` (or `instanceof` on the
 * concrete classes) to tell them apart.
 */
export abstract class SsmEnvError extends Error {
  abstract readonly kind: SsmEnvErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * An entry did not contain a `=` separator.
 */
export class InvalidEnvVarFormatError extends SsmEnvError {
  readonly kind = 'InvalidEnvVarFormat';

  constructor(readonly originalEnvVar: string) {
    super(`invalid environment variable format: ${originalEnvVar}`);
  }
}

/**
 * The GetParameters call itself failed. The original rejection is kept as
 * `cause`.
 */
export class GetParametersError extends SsmEnvError {
  readonly kind = 'GetParameters';

  constructor(cause: unknown) {
    super(`failed to get SSM parameters: ${describeCause(cause)}`, { cause });
  }
}

/**
 * Parameter Store reported some requested names as invalid.
 */
export class InvalidParametersError extends SsmEnvError {
  readonly kind = 'InvalidParameters';

  constructor(readonly invalidParameters: string[]) {
    super(`invalid SSM parameters respond: [${invalidParameters.join(' ')}]`);
  }
}

/**
 * A returned parameter had no name or no value.
 */
export class NullParameterError extends SsmEnvError {
  readonly kind = 'NullParameter';

  constructor() {
    super('null parameter response');
  }
}

/**
 * A requested parameter was missing from an otherwise successful response.
 */
export class ParameterNotFoundError extends SsmEnvError {
  readonly kind = 'ParameterNotFound';

  constructor(readonly key: string) {
    super(`parameter not found: ${key}`);
  }
}

export type SsmEnvFailure =
  | InvalidEnvVarFormatError
  | GetParametersError
  | InvalidParametersError
  | NullParameterError
  | ParameterNotFoundError;

/**
 * Narrow an unknown rejection to one of the resolution errors.
 */
export const isSsmEnvError = (error: unknown): error is SsmEnvFailure =>
  error instanceof InvalidEnvVarFormatError ||
  error instanceof GetParametersError ||
  error instanceof InvalidParametersError ||
  error instanceof NullParameterError ||
  error instanceof ParameterNotFoundError;

const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  return String(cause);
};
