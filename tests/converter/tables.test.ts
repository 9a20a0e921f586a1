import { describe, it, expect } from 'vitest';
import {
  convertKrutiDevToUnicode,
  listTables,
  MULTI_UNIT_TABLE,
  PREBASE_MARKER,
  SINGLE_UNIT_TABLE
} from '../../src/converter';

const allRules = [...MULTI_UNIT_TABLE.rules, ...SINGLE_UNIT_TABLE.rules];

describe('Kruti Dev tables', () => {
  it('holds multi-unit keys of two or more units and single-unit keys of one', () => {
    expect(MULTI_UNIT_TABLE.size).toBe(50);
    expect(SINGLE_UNIT_TABLE.size).toBe(133);
    expect(MULTI_UNIT_TABLE.rules.every((r) => Array.from(r.pattern).length >= 2)).toBe(true);
    expect(SINGLE_UNIT_TABLE.rules.every((r) => Array.from(r.pattern).length === 1)).toBe(true);
  });

  it('applies three-unit patterns before two-unit ones, in declaration order', () => {
    expect(MULTI_UNIT_TABLE.rules.slice(0, 10).map((r) => r.pattern))
      .toEqual(['[+k', 'vks', 'vkS', 'nzZ', '<ªª', 'èQs', 'pkS', '=kk', 'f=k', '[+']);
    expect(SINGLE_UNIT_TABLE.rules.slice(0, 3).map((r) => r.pattern)).toEqual(['É', '®', 'Ê']);
  });

  it('keeps the consonant meaning of the quote keys', () => {
    expect(SINGLE_UNIT_TABLE.lookup("'")).toBe('श्');
    expect(SINGLE_UNIT_TABLE.lookup('"')).toBe('ष्');
  });

  it('does not map the i-matra marker by itself', () => {
    expect(SINGLE_UNIT_TABLE.lookup(PREBASE_MARKER)).toBeUndefined();
  });

  it('never produces text that another rule would match again', () => {
    for (const rule of allRules) {
      for (const other of allRules) {
        expect(rule.replacement.includes(other.pattern)).toBe(false);
      }
      expect(rule.replacement.includes(PREBASE_MARKER)).toBe(false);
    }
  });

  it('converts every pattern on its own to exactly its replacement', () => {
    for (const rule of allRules) {
      const result = convertKrutiDevToUnicode(rule.pattern);
      expect(result.text).toBe(rule.replacement);
      expect(result.unmapped).toEqual([]);
    }
  });

  it('lists both tables in application order', () => {
    const [multi, single] = listTables();
    expect(multi.name).toBe('multi-unit');
    expect(multi.rules[0]).toEqual({ order: 1, pattern: '[+k', replacement: MULTI_UNIT_TABLE.lookup('[+k'), group: 'nukta' });
    expect(single.name).toBe('single-unit');
    expect(single.rules).toHaveLength(133);
    expect(single.rules[0]).toEqual({ order: 1, pattern: 'É', replacement: 'ा', group: 'high-frequency' });
  });
});
