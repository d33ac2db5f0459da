import { DatabaseError } from 'pg';
import { ErrorTypeConflictError } from './errors';

/**
 * A class of thrown values. Subtyping follows the prototype chain.
 */
export type ErrorType = abstract new (...args: never[]) => unknown;

export function isErrorType(value: unknown): value is ErrorType {
  return typeof value === 'function';
}

/**
 * True when `type` is `ancestor` or inherits from it.
 */
export function isSubtype(type: ErrorType, ancestor: ErrorType): boolean {
  if (type === ancestor) {
    return true;
  }
  const prototype: unknown = type.prototype;
  return prototype instanceof ancestor;
}

/**
 * Exact runtime type of a thrown value, or undefined for primitives and
 * objects without a prototype.
 */
export function errorTypeOf(value: unknown): ErrorType | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  if (typeof prototype !== 'object' || prototype === null) {
    return undefined;
  }
  const constructor: unknown = prototype.constructor;
  return isErrorType(constructor) ? constructor : undefined;
}

/**
 * Reads the error code of errors that carry one.
 * `type` is the class that rules keyed by code are bound to.
 */
export interface ErrorCodeCapability {
  readonly type: ErrorType;
  codeOf(error: unknown): string | undefined;
}

/** SQLSTATE of node-postgres server errors. */
export const sqlStateCapability: ErrorCodeCapability = {
  type: DatabaseError,
  codeOf: (error) => (error instanceof DatabaseError ? error.code : undefined),
};

/**
 * Explicit table of qualified type names usable in rule keys.
 * A type may be registered under several names; the first one is canonical.
 */
export class ErrorTypeRegistry {
  private readonly byName = new Map<string, ErrorType>();
  private readonly canonicalNames = new Map<ErrorType, string>();

  register(name: string, type: ErrorType): this {
    const existing = this.byName.get(name);
    if (existing !== undefined && existing !== type) {
      throw new ErrorTypeConflictError(name);
    }
    this.byName.set(name, type);
    if (!this.canonicalNames.has(type)) {
      this.canonicalNames.set(type, name);
    }
    return this;
  }

  get(name: string): ErrorType | undefined {
    return this.byName.get(name);
  }

  nameOf(type: ErrorType): string {
    return this.canonicalNames.get(type) ?? type.name;
  }
}

/**
 * Registry holding the built-in error classes and the pg driver's
 * `DatabaseError`.
 */
export function defaultErrorTypes(): ErrorTypeRegistry {
  return new ErrorTypeRegistry()
    .register('Error', Error)
    .register('EvalError', EvalError)
    .register('RangeError', RangeError)
    .register('ReferenceError', ReferenceError)
    .register('SyntaxError', SyntaxError)
    .register('TypeError', TypeError)
    .register('URIError', URIError)
    .register('pg.DatabaseError', DatabaseError);
}
