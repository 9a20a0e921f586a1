import { describe, it, expect } from 'vitest';
import { buildRuleTable, RuleTableError, RuleTableSource } from '../../src/converter';

const source = (rules: string[][], name = 'test'): RuleTableSource => ({ groups: [{ name, rules }] });

describe('buildRuleTable', () => {
  it('orders rules longest first and keeps declaration order for equal lengths', () => {
    const table = buildRuleTable('t', source([['ab', '1'], ['abc', '2'], ['cd', '3'], ['xyz', '4']]), {
      minPatternLength: 2
    });
    expect(table.rules.map((r) => r.pattern)).toEqual(['abc', 'xyz', 'ab', 'cd']);
    expect(table.size).toBe(4);
  });

  it('looks up replacements and keeps group names', () => {
    const table = buildRuleTable('t', {
      groups: [
        { name: 'first', rules: [['a', 'x']] },
        { name: 'second', rules: [['b', 'y']] }
      ]
    }, { minPatternLength: 1, maxPatternLength: 1 });

    expect(table.lookup('b')).toBe('y');
    expect(table.lookup('c')).toBeUndefined();
    expect(table.rules.map((r) => r.group)).toEqual(['first', 'second']);
  });

  it('rejects duplicate patterns and reports them', () => {
    let caught: unknown;
    try {
      buildRuleTable('quotes', source([["'", 'श्'], ['a', 'x'], ["'", "'"]]), { minPatternLength: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RuleTableError);
    expect(caught instanceof RuleTableError && caught.patterns).toEqual(["'"]);
    expect(caught instanceof RuleTableError && caught.message).toBe(`quotes: duplicate patterns "'"`);
  });

  it('rejects patterns outside the length bounds', () => {
    expect(() => buildRuleTable('single', source([['ab', 'x']]), { minPatternLength: 1, maxPatternLength: 1 }))
      .toThrowError('single: pattern "ab" has length 2');
    expect(() => buildRuleTable('multi', source([['a', 'x']]), { minPatternLength: 2 }))
      .toThrowError(RuleTableError);
  });

  it('rejects malformed pairs and empty replacements', () => {
    expect(() => buildRuleTable('t', source([['a']]), { minPatternLength: 1 }))
      .toThrowError('t: rule in group "test" must be a [pattern, replacement] pair');
    expect(() => buildRuleTable('t', source([['a', '']]), { minPatternLength: 1 }))
      .toThrowError('t: pattern "a" has an empty replacement');
  });

  it('freezes the table', () => {
    const table = buildRuleTable('t', source([['a', 'x']]), { minPatternLength: 1 });
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.rules)).toBe(true);
    expect(Object.isFrozen(table.rules[0])).toBe(true);
  });
});
