import multiUnitSource from '../data/krutiDevMultiUnit.json';
import singleUnitSource from '../data/krutiDevSingleUnit.json';
import { buildRuleTable } from './ruleTable';
import { ConverterTables, RuleTable } from './types';

// The i-matra is typed before its consonant in Kruti Dev but stored after it in Unicode
export const PREBASE_MARKER = 'f';
export const PREBASE_VOWEL_SIGN = '\u093F';

// Conjuncts, nukta forms and consonant + aa ligatures (keys of 2+ units)
export const MULTI_UNIT_TABLE: RuleTable = buildRuleTable('multi-unit', multiUnitSource, {
  minPatternLength: 2
});

export const SINGLE_UNIT_TABLE: RuleTable = buildRuleTable('single-unit', singleUnitSource, {
  minPatternLength: 1,
  maxPatternLength: 1
});

export const KRUTI_DEV_TABLES: ConverterTables = Object.freeze({
  multiUnit: MULTI_UNIT_TABLE,
  singleUnit: SINGLE_UNIT_TABLE
});

export interface TableListing {
  name: string;
  size: number;
  rules: Array<{ order: number; pattern: string; replacement: string; group: string }>;
}

/**
 * Enumerate tables in the order they are applied, each rule with its
 * position in that order.
 */
export function listTables(tables: ConverterTables = KRUTI_DEV_TABLES): TableListing[] {
  return [tables.multiUnit, tables.singleUnit].map((table) => ({
    name: table.name,
    size: table.size,
    rules: table.rules.map((rule, index) => ({
      order: index + 1,
      pattern: rule.pattern,
      replacement: rule.replacement,
      group: rule.group
    }))
  }));
}
