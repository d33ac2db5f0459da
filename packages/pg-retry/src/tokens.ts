export const RETRY_CLASSIFIER = Symbol('RETRY_CLASSIFIER');
export const RETRY_OPTIONS = Symbol('RETRY_OPTIONS');
export const PG_POOL = Symbol('PG_POOL');
export const OWNED_POOL = Symbol('OWNED_POOL');
