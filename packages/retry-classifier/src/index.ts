export type { Action, ConfiguredAction } from './action';
export { CONFIGURED_ACTIONS } from './action';
export {
  defaultErrorTypes,
  errorTypeOf,
  isSubtype,
  sqlStateCapability,
  ErrorTypeRegistry,
} from './error-type';
export type { ErrorCodeCapability, ErrorType } from './error-type';
export { Rule, SQL_STATE_PREFIX, rulePrecedence } from './rule';
export { RetryClassifier } from './classifier';
export type { ClassifierOptions, RuleConfig } from './classifier';
export { loadRuleFile } from './rule-file';
export * from './errors';
