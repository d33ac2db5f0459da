import 'reflect-metadata';

export { RetryClassifierModule } from './retry-classifier.module';
export type { RetryClassifierModuleOptions } from './retry-classifier.module';
export { TransactionRunner } from './transaction-runner';
export type { ClientSource } from './transaction-runner';
export { RETRY_DEFAULTS, retryDelay, shouldRetry } from './retry.policy';
export type { RetryOptions } from './retry.policy';
export { PG_POOL, RETRY_CLASSIFIER, RETRY_OPTIONS } from './tokens';
export { createPool } from './db';
export { loadPgEnv, loadRetryEnv } from './config';
export type { PgEnv, RetryEnv } from './config';
export { InvalidEnvironmentError } from './errors';
export { PoolCloser } from './pool-closer';
