import { z } from 'zod';

/**
 * Outcome of evaluating a rule. `IGNORE` means the rule has no opinion about
 * the error and is never produced from configuration.
 */
export type Action = 'RETRY' | 'THROW' | 'IGNORE';

export type ConfiguredAction = Exclude<Action, 'IGNORE'>;

export const CONFIGURED_ACTIONS = ['RETRY', 'THROW'] as const satisfies readonly ConfiguredAction[];

// Values are case-insensitive and may carry surrounding whitespace.
export const configuredActionSchema = z
  .string()
  .trim()
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(CONFIGURED_ACTIONS));
