import { defaultErrorTypes } from './error-type';
import type { ErrorTypeRegistry } from './error-type';

export class SuperError extends Error {
  constructor(message = 'super', options?: ErrorOptions) {
    super(message, options);
    this.name = 'SuperError';
  }
}

export class SibError extends SuperError {
  constructor(message = 'sib', options?: ErrorOptions) {
    super(message, options);
    this.name = 'SibError';
  }
}

export class SubError extends SuperError {
  constructor(message = 'sub', options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubError';
  }
}

export class SubSubError extends SubError {
  constructor(message = 'subSub', options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubSubError';
  }
}

export const SUPER = 'test.SuperError';
export const SIB = 'test.SibError';
export const SUB = 'test.SubError';
export const SUB_SUB = 'test.SubSubError';

/** Default registry plus the test hierarchy above. */
export function testErrorTypes(): ErrorTypeRegistry {
  return defaultErrorTypes()
    .register(SUPER, SuperError)
    .register(SIB, SibError)
    .register(SUB, SubError)
    .register(SUB_SUB, SubSubError);
}
