import { z } from 'zod';
import { describeIssues } from '@pkg/shared';
import { InvalidEnvironmentError } from './errors';

type Env = Record<string, string | undefined>;

const emptyAsUndefined = (val: unknown) => (val === '' ? undefined : val);

export const retryEnvSchema = z.object({
  RETRY_RULES_FILE: z.preprocess(emptyAsUndefined, z.string().trim().min(1).optional()),
  RETRY_MAX_ATTEMPTS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(1, 'RETRY_MAX_ATTEMPTS must be at least 1').default(5),
  ),
  RETRY_DELAY_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(0, 'RETRY_DELAY_MS must not be negative').default(100),
  ),
  RETRY_MAX_DELAY_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(0, 'RETRY_MAX_DELAY_MS must not be negative').default(5000),
  ),
});

export const pgEnvSchema = z.object({
  PGHOST: z.string().default('localhost'),
  PGPORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(5432)),
  PGUSER: z.string().default('app'),
  PGPASSWORD: z.string().default('app'),
  PGDATABASE: z.string().default('app'),
  PGPOOL_MAX: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(5)),
});

export type RetryEnv = z.output<typeof retryEnvSchema>;
export type PgEnv = z.output<typeof pgEnvSchema>;

export function loadRetryEnv(env: Env = process.env): RetryEnv {
  return parseEnv(retryEnvSchema, env);
}

export function loadPgEnv(env: Env = process.env): PgEnv {
  return parseEnv(pgEnvSchema, env);
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new InvalidEnvironmentError(describeIssues(result.error));
  }
  return result.data;
}
