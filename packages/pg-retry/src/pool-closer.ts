import { Inject, Injectable } from '@nestjs/common';
import type { OnApplicationShutdown } from '@nestjs/common';
import type { Pool } from 'pg';
import { logger } from '@pkg/shared';
import { OWNED_POOL } from './tokens';

/**
 * Ends a pool the module created itself once the application shuts down.
 */
@Injectable()
export class PoolCloser implements OnApplicationShutdown {
  constructor(@Inject(OWNED_POOL) private readonly pool: Pick<Pool, 'end'>) {}

  async onApplicationShutdown(signal?: string): Promise<void> {
    await this.pool.end();
    logger.info({ service: 'pg-retry', signal }, 'pg pool ended');
  }
}
