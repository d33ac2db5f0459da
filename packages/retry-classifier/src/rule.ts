import type { Action, ConfiguredAction } from './action';
import { errorTypeOf, isSubtype } from './error-type';
import type { ErrorType } from './error-type';

export const SQL_STATE_PREFIX = 'sqlState.';

export type RuleInit = {
  action: ConfiguredAction;
  target: ErrorType;
  targetName: string;
  errorCode?: string;
  messagePattern?: RegExp;
  codeOf?: (error: unknown) => string | undefined;
};

/**
 * A single configured matcher: errors of `target` (or a subclass), optionally
 * narrowed by error code and by a pattern searched for in the message.
 */
export class Rule {
  readonly action: ConfiguredAction;
  readonly target: ErrorType;
  readonly targetName: string;
  /** Stored upper-cased; matched case-insensitively. */
  readonly errorCode: string | undefined;
  readonly messagePattern: RegExp | undefined;
  private readonly codeOf: (error: unknown) => string | undefined;

  constructor(init: RuleInit) {
    this.action = init.action;
    this.target = init.target;
    this.targetName = init.targetName;
    this.errorCode = init.errorCode?.toUpperCase();
    this.messagePattern = init.messagePattern;
    this.codeOf = init.codeOf ?? (() => undefined);
    Object.freeze(this);
  }

  appliesTo(type: ErrorType): boolean {
    return isSubtype(type, this.target);
  }

  decide(error: unknown, message: string | undefined): Action {
    const type = errorTypeOf(error);
    if (type === undefined || !this.appliesTo(type)) {
      return 'IGNORE';
    }
    if (this.errorCode !== undefined) {
      const code = this.codeOf(error);
      if (code === undefined || code.toUpperCase() !== this.errorCode) {
        return 'IGNORE';
      }
    }
    if (this.messagePattern !== undefined) {
      if (message === undefined || message.search(this.messagePattern) === -1) {
        return 'IGNORE';
      }
    }
    return this.action;
  }

  toString(): string {
    let key =
      this.errorCode !== undefined
        ? `${SQL_STATE_PREFIX}${this.errorCode}`
        : this.targetName;
    if (this.messagePattern !== undefined) {
      key += `;${this.messagePattern.source}`;
    }
    return `${key}=${this.action}`;
  }
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

// Absent values sort after present ones.
function compareOptional(a: string | undefined, b: string | undefined): number {
  if (a === undefined || b === undefined) {
    return a === b ? 0 : a === undefined ? 1 : -1;
  }
  return compareText(a, b);
}

function compareSpecificity(a: Rule, b: Rule): number {
  if (a.target === b.target) {
    return 0;
  }
  if (isSubtype(b.target, a.target)) {
    return 1;
  }
  if (isSubtype(a.target, b.target)) {
    return -1;
  }
  return 0;
}

/**
 * Evaluation order of rules: subclasses before their ancestors, then by type
 * name, error code, message pattern and action. Missing codes and patterns
 * sort last so that narrower rules are tried first.
 */
export function rulePrecedence(a: Rule, b: Rule): number {
  return (
    compareSpecificity(a, b) ||
    compareText(a.targetName, b.targetName) ||
    compareOptional(a.errorCode, b.errorCode) ||
    compareOptional(a.messagePattern?.source, b.messagePattern?.source) ||
    compareText(a.action, b.action)
  );
}
