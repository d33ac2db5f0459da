import { describeIssues, logger } from '@pkg/shared';
import { configuredActionSchema } from './action';
import {
  defaultErrorTypes,
  errorTypeOf,
  sqlStateCapability,
} from './error-type';
import type {
  ErrorCodeCapability,
  ErrorType,
  ErrorTypeRegistry,
} from './error-type';
import {
  DuplicateRuleError,
  EmptyErrorCodeError,
  InvalidPatternError,
  RuleConfigFormatError,
  UnknownActionError,
  UnknownErrorTypeError,
} from './errors';
import { Rule, SQL_STATE_PREFIX, rulePrecedence } from './rule';
import { loadRuleFile, ruleConfigSchema } from './rule-file';

/**
 * Rule keys mapped to actions, e.g.
 *
 *   pg.DatabaseError = THROW
 *   Error;ECONNRESET = RETRY
 *   sqlState.40001 = RETRY
 *   sqlState.40001;restart transaction = RETRY
 */
export type RuleConfig =
  | Readonly<Record<string, string>>
  | ReadonlyMap<string, string>;

export interface ClassifierOptions {
  /** Resolves type names used in rule keys. Defaults to {@link defaultErrorTypes}. */
  registry?: ErrorTypeRegistry;
  /** Binds `sqlState.` rules. Defaults to the pg SQLSTATE. */
  capability?: ErrorCodeCapability;
}

const SERVICE = 'retry-classifier';

/**
 * Decides whether an operation that failed with a given error should be
 * retried, based on an immutable set of rules.
 *
 * Errors are examined from the root cause outward, so a precise cause wins
 * over the generic errors wrapping it. Within one error, the first rule in
 * {@link rulePrecedence} order that has an opinion decides. Errors no rule
 * matches are not retried.
 */
export class RetryClassifier {
  /** Memoizes {@link rulesFor}; entries are written once and never change. */
  private readonly typeCache = new Map<ErrorType, readonly Rule[]>();

  private constructor(private readonly sortedRules: readonly Rule[]) {}

  static fromMap(
    config: RuleConfig,
    options: ClassifierOptions = {},
  ): RetryClassifier {
    const registry = options.registry ?? defaultErrorTypes();
    const capability = options.capability ?? sqlStateCapability;
    const parsed = ruleConfigSchema.safeParse(
      isRuleMap(config) ? Object.fromEntries(config) : config,
    );
    if (!parsed.success) {
      throw new RuleConfigFormatError(describeIssues(parsed.error));
    }
    const entries = Object.entries(parsed.data);

    const rules: Rule[] = [];
    const seen = new Map<ErrorType, Map<string, Rule>>();
    for (const [key, value] of entries) {
      logger.trace({ service: SERVICE, key, value }, 'raw retry rule');
      const rule = parseRule(key, value, registry, capability);

      const identity = `${rule.errorCode ?? ''}\u0000${rule.messagePattern?.source ?? ''}`;
      const sameTarget = seen.get(rule.target) ?? new Map<string, Rule>();
      const existing = sameTarget.get(identity);
      if (existing !== undefined) {
        throw new DuplicateRuleError(key, value, existing.toString());
      }
      sameTarget.set(identity, rule);
      seen.set(rule.target, sameTarget);

      rules.push(rule);
    }

    rules.sort(rulePrecedence);
    logger.trace(
      { service: SERVICE, rules: rules.map((rule) => rule.toString()) },
      'sorted retry rules',
    );
    return new RetryClassifier(Object.freeze(rules));
  }

  /**
   * Builds a classifier from a JSON file holding an object of rule keys to
   * actions.
   */
  static async fromFile(
    path: string,
    options: ClassifierOptions = {},
  ): Promise<RetryClassifier> {
    const config = await loadRuleFile(path);
    return RetryClassifier.fromMap(config, options);
  }

  /** All rules in evaluation order. */
  get rules(): readonly Rule[] {
    return this.sortedRules;
  }

  shouldRetry(error: unknown): boolean {
    const chain = causeChain(error);

    for (const link of chain.reverse()) {
      const type = errorTypeOf(link);
      if (type === undefined) {
        continue;
      }
      const message = messageOf(link);
      for (const rule of this.rulesFor(type)) {
        const action = rule.decide(link, message);
        if (action !== 'IGNORE') {
          logger.debug(
            { service: SERVICE, rule: rule.toString(), action, error },
            'retry rule matched',
          );
          return action === 'RETRY';
        }
      }
    }

    logger.trace({ service: SERVICE, error }, 'no retry rule matched');
    return false;
  }

  /**
   * Rules that apply to errors of exactly `type`, in evaluation order.
   */
  rulesFor(type: ErrorType): readonly Rule[] {
    const cached = this.typeCache.get(type);
    if (cached !== undefined) {
      return cached;
    }

    // The targets of these rules all lie on one prototype chain, where the
    // precedence order is total; re-sorting keeps subclasses first.
    const applicable = Object.freeze(
      this.sortedRules.filter((rule) => rule.appliesTo(type)).sort(rulePrecedence),
    );
    this.typeCache.set(type, applicable);
    logger.trace(
      {
        service: SERVICE,
        type: type.name,
        rules: applicable.map((rule) => rule.toString()),
      },
      'applicable retry rules',
    );
    return applicable;
  }
}

function isRuleMap(config: RuleConfig): config is ReadonlyMap<string, string> {
  return config instanceof Map;
}

function parseRule(
  key: string,
  value: string,
  registry: ErrorTypeRegistry,
  capability: ErrorCodeCapability,
): Rule {
  const parsedAction = configuredActionSchema.safeParse(value);
  if (!parsedAction.success) {
    throw new UnknownActionError(key, value);
  }
  const action = parsedAction.data;

  const separator = key.indexOf(';');
  const descriptor = separator === -1 ? key : key.slice(0, separator);
  const patternText = separator === -1 ? '' : key.slice(separator + 1);

  let messagePattern: RegExp | undefined;
  if (patternText !== '') {
    try {
      messagePattern = new RegExp(patternText);
    } catch (error) {
      throw new InvalidPatternError(key, value, patternText, error);
    }
  }

  if (descriptor.startsWith(SQL_STATE_PREFIX)) {
    const errorCode = descriptor.slice(SQL_STATE_PREFIX.length);
    if (errorCode === '') {
      throw new EmptyErrorCodeError(key, value);
    }
    return new Rule({
      action,
      target: capability.type,
      targetName: registry.nameOf(capability.type),
      errorCode,
      messagePattern,
      codeOf: capability.codeOf,
    });
  }

  const target = registry.get(descriptor);
  if (target === undefined) {
    throw new UnknownErrorTypeError(key, value, descriptor);
  }
  return new Rule({
    action,
    target,
    targetName: registry.nameOf(target),
    messagePattern,
  });
}

/**
 * The error followed by each of its causes, outermost first. Stops at the
 * first value already seen.
 */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let link = error;
  while (link !== undefined && link !== null && !seen.has(link)) {
    chain.push(link);
    seen.add(link);
    link = causeOf(link);
  }
  return chain;
}

function causeOf(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'cause' in value) {
    return value.cause;
  }
  return undefined;
}

function messageOf(value: unknown): string | undefined {
  if (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  ) {
    return value.message;
  }
  return undefined;
}
