import { join } from 'node:path';
import { loadRuleFile } from './rule-file';
import { RuleFileFormatError, RuleFileNotFoundError } from './errors';

describe('loadRuleFile', () => {
  const fixtures = join(__dirname, 'fixtures');

  it('should return the rule entries of a JSON object', async () => {
    const rules = await loadRuleFile(join(fixtures, 'retry-rules.json'));
    expect(rules['sqlState.40001']).toBe('RETRY');
    expect(rules['pg.DatabaseError']).toBe('THROW');
    expect(Object.keys(rules)).toHaveLength(7);
  });

  it('should report a missing file', async () => {
    const path = join(fixtures, 'missing.json');
    await expect(loadRuleFile(path)).rejects.toThrow(RuleFileNotFoundError);
    await expect(loadRuleFile(path)).rejects.toThrow(path);
  });

  it('should pass on read failures other than a missing file', async () => {
    await expect(loadRuleFile(fixtures)).rejects.toMatchObject({
      code: 'EISDIR',
    });
  });

  it('should reject text that is not JSON', async () => {
    await expect(
      loadRuleFile(join(fixtures, 'truncated.json')),
    ).rejects.toThrow(RuleFileFormatError);
  });

  it('should reject actions that are not strings', async () => {
    const path = join(fixtures, 'bad-action.json');

    await expect(loadRuleFile(path)).rejects.toBeInstanceOf(RuleFileFormatError);
    await expect(loadRuleFile(path)).rejects.toMatchObject({
      path,
      reason: 'sqlState.40001: action must be a string',
    });
  });
});
