import { ResidualCodepoint, ResidualReason } from './types';

// Devanagari, Gurmukhi, printable ASCII, whitespace, danda / double danda.
// Whitespace is listed out: \s would also accept U+FEFF (byte order mark).
const ACCEPTED_CHAR = /^[\u0900-\u097F\u0A00-\u0A7F\u0020-\u007E\t\n\v\f\r\x1C-\x1F\x85\xA0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000\u0964\u0965]$/u;

export function isAcceptedChar(char: string): boolean {
  return ACCEPTED_CHAR.test(char);
}

export function formatCodepoint(codepoint: number): string {
  return `U+${codepoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Report characters left in converted text that no table accounted for.
 * `markers` are reorder markers, which are printable ASCII and would
 * otherwise pass as accepted.
 */
export function scanResiduals(text: string, options: { markers?: readonly string[] } = {}): ResidualCodepoint[] {
  const markers = new Set(options.markers ?? []);
  const found = new Map<string, ResidualCodepoint>();

  let index = 0;
  for (const char of text) {
    let reason: ResidualReason | null = null;
    if (markers.has(char)) {
      reason = 'dangling-marker';
    } else if (!isAcceptedChar(char)) {
      reason = 'out-of-range';
    }

    if (reason) {
      const existing = found.get(char);
      if (existing) {
        existing.count++;
      } else {
        const codepoint = char.codePointAt(0) ?? 0;
        found.set(char, { char, codepoint, label: formatCodepoint(codepoint), count: 1, firstIndex: index, reason });
      }
    }
    index++;
  }

  return [...found.values()].sort((a, b) => a.codepoint - b.codepoint);
}
