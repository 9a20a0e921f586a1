export interface SubstitutionRule {
  pattern: string;
  replacement: string;
  group: string; // Table section the rule was declared in
}

export interface RuleTable {
  readonly name: string;
  /** Rules in application order: longest pattern first, ties in declaration order */
  readonly rules: readonly SubstitutionRule[];
  readonly size: number;
  lookup(pattern: string): string | undefined;
}

export interface ConverterTables {
  multiUnit: RuleTable;
  singleUnit: RuleTable;
}

export type ResidualReason = 'out-of-range' | 'dangling-marker';

export interface ResidualCodepoint {
  char: string;
  codepoint: number;
  label: string; // e.g. U+00A9
  count: number;
  firstIndex: number; // Code point index in the converted text
  reason: ResidualReason;
}

export interface ConversionResult {
  text: string;
  unmapped: ResidualCodepoint[];
}
