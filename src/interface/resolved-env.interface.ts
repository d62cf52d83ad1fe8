/**
 * Key-value map of environment variable names to their resolved values.
 *
 * @example
 * ```typescript
 * // APP_ENV=production, DB_PASSWORD=ssm://prod/db/password
 * {
 *   "APP_ENV": "production",
 *   "DB_PASSWORD": "<decrypted value of prod/db/password>"
 * }
 * ```
 */
export interface ResolvedEnv {
  [key: string]: string;
}
