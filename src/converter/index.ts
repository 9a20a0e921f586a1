import { reorderPrebaseVowelSign } from './reorder';
import { scanResiduals } from './residual';
import { substitute } from './substitute';
import { KRUTI_DEV_TABLES, PREBASE_MARKER, PREBASE_VOWEL_SIGN } from './tables';
import { ConversionResult, ConverterTables } from './types';

export type Converter = (text: string) => ConversionResult;

/**
 * Build a converter over the given tables.
 *
 * Conversion runs in a fixed order: multi-unit substitution, single-unit
 * substitution, the i-matra reordering pass, then the residual scan. The
 * converter never throws; characters it cannot map are left in the text and
 * listed in `unmapped`.
 */
export function createConverter(tables: ConverterTables): Converter {
  return (text: string): ConversionResult => {
    if (!text) {
      return { text: '', unmapped: [] };
    }

    const substituted = substitute(text, tables);
    const reordered = reorderPrebaseVowelSign(substituted, PREBASE_MARKER, PREBASE_VOWEL_SIGN);

    return {
      text: reordered,
      unmapped: scanResiduals(reordered, { markers: [PREBASE_MARKER] })
    };
  };
}

export const convertKrutiDevToUnicode: Converter = createConverter(KRUTI_DEV_TABLES);

export { applyRuleTable, substitute } from './substitute';
export { reorderPrebaseVowelSign } from './reorder';
export { scanResiduals, isAcceptedChar, formatCodepoint } from './residual';
export { buildRuleTable, RuleTableError } from './ruleTable';
export type { RuleTableSource } from './ruleTable';
export {
  KRUTI_DEV_TABLES,
  MULTI_UNIT_TABLE,
  SINGLE_UNIT_TABLE,
  PREBASE_MARKER,
  PREBASE_VOWEL_SIGN,
  listTables
} from './tables';
export type { TableListing } from './tables';
export type {
  ConversionResult,
  ConverterTables,
  ResidualCodepoint,
  ResidualReason,
  RuleTable,
  SubstitutionRule
} from './types';
