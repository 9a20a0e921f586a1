import { RuleTable, SubstitutionRule } from './types';

/**
 * Shape of a table definition file: named groups of `[pattern, replacement]`
 * pairs, in declaration order.
 */
export interface RuleTableSource {
  groups: Array<{
    name: string;
    rules: string[][];
  }>;
}

interface RuleTableOptions {
  minPatternLength: number;
  maxPatternLength?: number;
}

export class RuleTableError extends Error {
  constructor(message: string, public readonly patterns: string[] = []) {
    super(message);
    this.name = 'RuleTableError';
  }
}

/**
 * Build an immutable, pre-sorted rule table.
 *
 * Rules are ordered by pattern length (descending); rules of equal length keep
 * the order they were declared in. Duplicate patterns are rejected rather
 * than letting one entry shadow another.
 */
export function buildRuleTable(name: string, source: RuleTableSource, options: RuleTableOptions): RuleTable {
  const declared: SubstitutionRule[] = [];
  const byPattern = new Map<string, string>();
  const duplicates: string[] = [];

  for (const group of source.groups) {
    for (const entry of group.rules) {
      if (entry.length !== 2) {
        throw new RuleTableError(`${name}: rule in group "${group.name}" must be a [pattern, replacement] pair`);
      }
      const [pattern, replacement] = entry;
      const length = Array.from(pattern).length;

      if (length < options.minPatternLength || (options.maxPatternLength !== undefined && length > options.maxPatternLength)) {
        throw new RuleTableError(`${name}: pattern "${pattern}" has length ${length}`, [pattern]);
      }
      if (!replacement) {
        throw new RuleTableError(`${name}: pattern "${pattern}" has an empty replacement`, [pattern]);
      }

      if (byPattern.has(pattern)) {
        duplicates.push(pattern);
        continue;
      }

      byPattern.set(pattern, replacement);
      declared.push(Object.freeze({ pattern, replacement, group: group.name }));
    }
  }

  if (duplicates.length > 0) {
    throw new RuleTableError(
      `${name}: duplicate patterns ${duplicates.map((p) => JSON.stringify(p)).join(', ')}`,
      duplicates
    );
  }

  // Array.prototype.sort is stable, so equal lengths stay in declaration order
  const rules = Object.freeze(
    [...declared].sort((a, b) => Array.from(b.pattern).length - Array.from(a.pattern).length)
  );

  return Object.freeze({
    name,
    rules,
    size: rules.length,
    lookup: (pattern: string) => byPattern.get(pattern)
  });
}
