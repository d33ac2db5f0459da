import { Module } from '@nestjs/common';
import type { DynamicModule } from '@nestjs/common';
import { RetryClassifier } from '@pkg/retry-classifier';
import type { ClassifierOptions, RuleConfig } from '@pkg/retry-classifier';
import { loadRetryEnv } from './config';
import { createPool } from './db';
import { RETRY_DEFAULTS } from './retry.policy';
import type { RetryOptions } from './retry.policy';
import { PoolCloser } from './pool-closer';
import {
  OWNED_POOL,
  PG_POOL,
  RETRY_CLASSIFIER,
  RETRY_OPTIONS,
} from './tokens';
import { TransactionRunner } from './transaction-runner';
import type { ClientSource } from './transaction-runner';

export interface RetryClassifierModuleOptions extends Partial<RetryOptions> {
  pool: ClientSource;
  /** Inline rules, used when `rulesFile` is not set. */
  rules?: RuleConfig;
  /** JSON file of rules; takes precedence over `rules`. */
  rulesFile?: string;
  classifier?: ClassifierOptions;
}

@Module({})
export class RetryClassifierModule {
  static forRoot(options: RetryClassifierModuleOptions): DynamicModule {
    const retryOptions: RetryOptions = {
      maxAttempts: options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts,
      baseDelayMs: options.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
    };

    return {
      module: RetryClassifierModule,
      providers: [
        { provide: PG_POOL, useValue: options.pool },
        { provide: RETRY_OPTIONS, useValue: retryOptions },
        {
          provide: RETRY_CLASSIFIER,
          useFactory: (): RetryClassifier | Promise<RetryClassifier> =>
            options.rulesFile !== undefined
              ? RetryClassifier.fromFile(options.rulesFile, options.classifier)
              : RetryClassifier.fromMap(options.rules ?? {}, options.classifier),
        },
        TransactionRunner,
      ],
      exports: [RETRY_CLASSIFIER, TransactionRunner],
    };
  }

  /**
   * Configures the module from RETRY_* and PG* environment variables. The
   * pool created here is ended when the application shuts down.
   */
  static forEnv(
    env: Record<string, string | undefined> = process.env,
  ): DynamicModule {
    const config = loadRetryEnv(env);
    const pool = createPool(env);
    const dynamicModule = RetryClassifierModule.forRoot({
      pool,
      rulesFile: config.RETRY_RULES_FILE,
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
    });

    return {
      ...dynamicModule,
      providers: [
        ...(dynamicModule.providers ?? []),
        { provide: OWNED_POOL, useValue: pool },
        PoolCloser,
      ],
    };
  }
}
