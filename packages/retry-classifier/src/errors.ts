/**
 * Base class for every problem found while building a classifier from
 * configuration. Carries the offending entry.
 */
export class RuleConfigError extends Error {
  constructor(
    public readonly key: string,
    public readonly value: string,
    reason: string,
  ) {
    super(`Invalid retry rule "${key}" = "${value}": ${reason}`);
    this.name = 'RuleConfigError';
  }
}

export class UnknownActionError extends RuleConfigError {
  constructor(key: string, value: string) {
    super(key, value, 'action must be RETRY or THROW');
    this.name = 'UnknownActionError';
  }
}

export class UnknownErrorTypeError extends RuleConfigError {
  constructor(
    key: string,
    value: string,
    public readonly typeName: string,
  ) {
    super(key, value, `unknown error type ${typeName}`);
    this.name = 'UnknownErrorTypeError';
  }
}

export class InvalidPatternError extends RuleConfigError {
  constructor(
    key: string,
    value: string,
    public readonly pattern: string,
    cause: unknown,
  ) {
    super(
      key,
      value,
      `malformed message pattern /${pattern}/ (${cause instanceof Error ? cause.message : String(cause)})`,
    );
    this.name = 'InvalidPatternError';
  }
}

export class EmptyErrorCodeError extends RuleConfigError {
  constructor(key: string, value: string) {
    super(key, value, 'error code is empty');
    this.name = 'EmptyErrorCodeError';
  }
}

export class DuplicateRuleError extends RuleConfigError {
  constructor(
    key: string,
    value: string,
    public readonly existingRule: string,
  ) {
    super(key, value, `matches the same errors as ${existingRule}`);
    this.name = 'DuplicateRuleError';
  }
}

export class RuleConfigFormatError extends Error {
  constructor(public readonly issues: string) {
    super(`Retry rules must map rule keys to action names: ${issues}`);
    this.name = 'RuleConfigFormatError';
  }
}

export class ErrorTypeConflictError extends Error {
  constructor(public readonly typeName: string) {
    super(`Error type name ${typeName} is already registered to another type`);
    this.name = 'ErrorTypeConflictError';
  }
}

export class RuleFileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Retry rule file not found: ${path}`);
    this.name = 'RuleFileNotFoundError';
  }
}

export class RuleFileFormatError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Retry rule file ${path} is malformed: ${reason}`);
    this.name = 'RuleFileFormatError';
  }
}
