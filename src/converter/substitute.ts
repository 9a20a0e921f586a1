import { ConverterTables, RuleTable } from './types';

/**
 * Replace every literal occurrence of each pattern, one rule at a time.
 * Each rule runs over the text produced by the rules before it.
 */
export function applyRuleTable(text: string, table: RuleTable): string {
  let result = text;
  for (const { pattern, replacement } of table.rules) {
    if (result.includes(pattern)) {
      result = result.split(pattern).join(replacement);
    }
  }
  return result;
}

/** Multi-unit rules first so their sequences are never split by single-unit rules. */
export function substitute(text: string, tables: ConverterTables): string {
  return applyRuleTable(applyRuleTable(text, tables.multiUnit), tables.singleUnit);
}
