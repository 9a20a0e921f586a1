import { ResidualCodepoint } from '../converter';

interface DiagnosticOptions {
  source?: string;
  limit?: number;
  write?: (line: string) => void;
}

/**
 * Print a residual report, most useful when feeding new documents through
 * the converter and extending the tables. Returns the lines written.
 */
export function logResiduals(unmapped: readonly ResidualCodepoint[], options: DiagnosticOptions = {}): string[] {
  if (unmapped.length === 0) return [];

  const write = options.write ?? ((line: string) => console.warn(line));
  const limit = options.limit ?? 10;
  const where = options.source ? ` in ${options.source}` : '';

  const lines = [
    `[DEBUG] Unconverted characters detected${where}: ${unmapped.length} type(s)`,
    ...unmapped.slice(0, limit).map((r) => {
      const note = r.reason === 'dangling-marker' ? ' (dangling i-matra marker)' : '';
      return `  '${r.char}' (${r.label}) x${r.count}${note}`;
    })
  ];

  if (unmapped.length > limit) {
    lines.push(`  ... and ${unmapped.length - limit} more`);
  }

  lines.forEach((line) => write(line));
  return lines;
}

// Merge reports from several conversions into one, keeping the earliest sighting
export function mergeResiduals(reports: ReadonlyArray<readonly ResidualCodepoint[]>): ResidualCodepoint[] {
  const merged = new Map<string, ResidualCodepoint>();

  for (const report of reports) {
    for (const r of report) {
      const existing = merged.get(r.char);
      if (existing) {
        existing.count += r.count;
      } else {
        merged.set(r.char, { ...r });
      }
    }
  }

  return [...merged.values()].sort((a, b) => a.codepoint - b.codepoint);
}
