import { DatabaseError } from 'pg';
import { sqlStateCapability } from './error-type';
import { Rule, rulePrecedence } from './rule';
import type { RuleInit } from './rule';
import { SibError, SubError, SubSubError, SuperError } from './test-errors';

function rule(init: Partial<RuleInit> & Pick<RuleInit, 'target'>): Rule {
  return new Rule({
    action: 'RETRY',
    targetName: init.target.name,
    ...init,
  });
}

function sqlError(message: string, code?: string): DatabaseError {
  const error = new DatabaseError(message, 0, 'error');
  error.code = code;
  return error;
}

describe('Rule', () => {
  describe('appliesTo', () => {
    it('should apply to the target and its subclasses only', () => {
      const subRule = rule({ target: SubError });
      expect(subRule.appliesTo(SubError)).toBe(true);
      expect(subRule.appliesTo(SubSubError)).toBe(true);
      expect(subRule.appliesTo(SuperError)).toBe(false);
      expect(subRule.appliesTo(SibError)).toBe(false);
    });
  });

  describe('decide', () => {
    it('should return the action for a matching error', () => {
      const throwRule = rule({ target: SuperError, action: 'THROW' });
      expect(throwRule.decide(new SubSubError(), 'subSub')).toBe('THROW');
    });

    it('should ignore errors of unrelated types', () => {
      const subRule = rule({ target: SubError });
      expect(subRule.decide(new SibError(), 'sib')).toBe('IGNORE');
      expect(subRule.decide('not an error', undefined)).toBe('IGNORE');
    });

    it('should compare error codes case-insensitively', () => {
      const codeRule = rule({
        target: DatabaseError,
        errorCode: '40p01',
        codeOf: sqlStateCapability.codeOf,
      });
      expect(codeRule.errorCode).toBe('40P01');
      expect(codeRule.decide(sqlError('deadlock', '40P01'), 'deadlock')).toBe('RETRY');
      expect(codeRule.decide(sqlError('deadlock', '40p01'), 'deadlock')).toBe('RETRY');
      expect(codeRule.decide(sqlError('deadlock', '40001'), 'deadlock')).toBe('IGNORE');
      expect(codeRule.decide(sqlError('deadlock'), 'deadlock')).toBe('IGNORE');
    });

    it('should ignore coded rules when no code reader is given', () => {
      const codeRule = rule({ target: DatabaseError, errorCode: '40001' });
      expect(codeRule.decide(sqlError('conflict', '40001'), 'conflict')).toBe('IGNORE');
    });

    it('should search the message for the pattern', () => {
      const patternRule = rule({ target: Error, messagePattern: /restart/ });
      const error = new Error('please restart transaction');
      expect(patternRule.decide(error, error.message)).toBe('RETRY');
      expect(patternRule.decide(error, 'retry later')).toBe('IGNORE');
      expect(patternRule.decide(error, undefined)).toBe('IGNORE');
    });

    it('should give the same answer for a global pattern on every call', () => {
      const patternRule = rule({ target: Error, messagePattern: /deadlock/g });
      const error = new Error('deadlock detected');
      expect(patternRule.decide(error, error.message)).toBe('RETRY');
      expect(patternRule.decide(error, error.message)).toBe('RETRY');
      expect(patternRule.decide(error, error.message)).toBe('RETRY');
    });
  });

  describe('toString', () => {
    it('should render type rules as configuration keys', () => {
      const typeRule = rule({
        target: SubError,
        targetName: 'test.SubError',
        action: 'THROW',
        messagePattern: /timeout/,
      });
      expect(typeRule.toString()).toBe('test.SubError;timeout=THROW');
    });

    it('should render code rules with the sqlState prefix', () => {
      const codeRule = rule({ target: DatabaseError, errorCode: '40001' });
      expect(codeRule.toString()).toBe('sqlState.40001=RETRY');
    });
  });

  describe('rulePrecedence', () => {
    it('should order subclasses before their ancestors', () => {
      const superRule = rule({ target: SuperError, targetName: 'a.Super' });
      const subRule = rule({ target: SubError, targetName: 'z.Sub' });
      expect(rulePrecedence(subRule, superRule)).toBe(-1);
      expect(rulePrecedence(superRule, subRule)).toBe(1);
    });

    it('should order unrelated types by name', () => {
      const sibRule = rule({ target: SibError, targetName: 'test.SibError' });
      const subRule = rule({ target: SubError, targetName: 'test.SubError' });
      expect(rulePrecedence(sibRule, subRule)).toBe(-1);
      expect(rulePrecedence(subRule, sibRule)).toBe(1);
    });

    it('should order rules with codes before rules without', () => {
      const withCode = rule({ target: DatabaseError, errorCode: '40001' });
      const otherCode = rule({ target: DatabaseError, errorCode: '40P01' });
      const withoutCode = rule({ target: DatabaseError });
      const sorted = [withoutCode, otherCode, withCode].sort(rulePrecedence);
      expect(sorted).toEqual([withCode, otherCode, withoutCode]);
    });

    it('should order rules with patterns before rules without', () => {
      const withPattern = rule({ target: Error, messagePattern: /b/ });
      const otherPattern = rule({ target: Error, messagePattern: /a/ });
      const withoutPattern = rule({ target: Error });
      const sorted = [withoutPattern, withPattern, otherPattern].sort(rulePrecedence);
      expect(sorted).toEqual([otherPattern, withPattern, withoutPattern]);
    });

    it('should break remaining ties by action', () => {
      const retry = rule({ target: Error, action: 'RETRY' });
      const throwing = rule({ target: Error, action: 'THROW' });
      expect(rulePrecedence(retry, throwing)).toBe(-1);
      expect(rulePrecedence(throwing, retry)).toBe(1);
      expect(rulePrecedence(retry, rule({ target: Error }))).toBe(0);
    });
  });
});
