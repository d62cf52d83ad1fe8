export * from './module-options.interface';
export * from './module-async-options.interface';
export * from './parameter-fetcher.interface';
export * from './resolved-env.interface';
