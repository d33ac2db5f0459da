import type { ZodError } from "zod";

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Flattens Zod issues into a stable, deterministic list of field errors.
 */
export function formatIssues(error: ZodError): ValidationIssue[] {
  const issues = error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : issue.code,
    message: issue.message,
  }));

  issues.sort((a, b) => {
    if (a.path !== b.path) {
      return a.path.localeCompare(b.path);
    }
    return a.message.localeCompare(b.message);
  });

  return issues;
}

/**
 * Renders issues as `path: message` pairs for error messages.
 */
export function describeIssues(error: ZodError): string {
  return formatIssues(error)
    .map((issue) => `${issue.path}: ${issue.message}`)
    .join("; ");
}
