/**
 * Barrel export for injectable fetcher services.
 *
 * - SsmParameterFetcherService: Fetches parameters by name from AWS Systems Manager Parameter Store
 */
export { SsmParameterFetcherService } from './ssm-parameter-fetcher.service';
