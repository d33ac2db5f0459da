import { Inject, Injectable } from '@nestjs/common';
import type { Pool, PoolClient } from 'pg';
import { logger } from '@pkg/shared';
import { RetryClassifier } from '@pkg/retry-classifier';
import { retryDelay, shouldRetry } from './retry.policy';
import type { RetryOptions } from './retry.policy';
import { PG_POOL, RETRY_CLASSIFIER, RETRY_OPTIONS } from './tokens';

export type ClientSource = Pick<Pool, 'connect'>;

/**
 * Runs units of work inside a transaction and re-runs them when the failure
 * is classified as retryable (serialization conflicts, dropped connections).
 */
@Injectable()
export class TransactionRunner {
  constructor(
    @Inject(PG_POOL) private readonly pool: ClientSource,
    @Inject(RETRY_CLASSIFIER) private readonly classifier: RetryClassifier,
    @Inject(RETRY_OPTIONS) private readonly options: RetryOptions,
  ) {}

  /**
   * Executes `work` between BEGIN and COMMIT. Failing to get a connection
   * counts as a failed attempt. `work` may run several times and must not
   * have side effects outside the transaction.
   */
  async run<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      let failure: unknown;
      let client: PoolClient | undefined;
      try {
        client = await this.pool.connect();
        await client.query('BEGIN');
        const result = await work(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        failure = error;
        if (client !== undefined) {
          await client.query('ROLLBACK').catch((rollbackError: unknown) => {
            logger.warn(
              { service: 'pg-retry', attempt, error: rollbackError },
              'transaction rollback failed',
            );
          });
        }
      } finally {
        client?.release();
      }

      const retryable = this.classifier.shouldRetry(failure);
      if (!shouldRetry(attempt, this.options.maxAttempts, retryable)) {
        logger.error(
          { service: 'pg-retry', attempt, retryable, error: failure },
          'transaction failed',
        );
        throw failure;
      }

      const delayMs = retryDelay(
        attempt,
        this.options.baseDelayMs,
        this.options.maxDelayMs,
      );
      logger.info(
        { service: 'pg-retry', attempt, delay_ms: delayMs, error: failure },
        'transaction retrying',
      );
      await this.sleep(delayMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
