import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { describeIssues } from '@pkg/shared';
import { RuleFileFormatError, RuleFileNotFoundError } from './errors';

export const ruleConfigSchema = z.record(
  z.string(),
  z.string({ invalid_type_error: 'action must be a string' }),
);

/**
 * Reads a JSON object of rule keys to actions. Rule semantics are checked
 * later, when the classifier is built.
 */
export async function loadRuleFile(
  path: string,
): Promise<Record<string, string>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new RuleFileNotFoundError(path);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new RuleFileFormatError(
      path,
      error instanceof Error ? error.message : String(error),
    );
  }

  const result = ruleConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new RuleFileFormatError(path, describeIssues(result.error));
  }
  return result.data;
}

// fs errors are not always `instanceof Error` here (e.g. across realms).
function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
