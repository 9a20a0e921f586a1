import { ResidualCodepoint } from '../../src/converter';
import { GlyphReport, GlyphReportStore } from '../../src/services/glyphReportStore';

// In-process stand-in for MongoGlyphReportStore
export class MemoryGlyphStore implements GlyphReportStore {
  readonly glyphs = new Map<number, GlyphReport>();

  async record(unmapped: readonly ResidualCodepoint[], source: string): Promise<void> {
    const now = new Date();
    for (const r of unmapped) {
      const existing = this.glyphs.get(r.codepoint);
      if (existing) {
        existing.occurrences += r.count;
        existing.lastSeenAt = now;
        existing.sources.push(source);
      } else {
        this.glyphs.set(r.codepoint, {
          char: r.char,
          codepoint: r.codepoint,
          label: r.label,
          reason: r.reason,
          occurrences: r.count,
          sources: [source],
          firstSeenAt: now,
          lastSeenAt: now
        });
      }
    }
  }

  async list(limit: number): Promise<GlyphReport[]> {
    return [...this.glyphs.values()]
      .sort((a, b) => b.occurrences - a.occurrences || a.codepoint - b.codepoint)
      .slice(0, limit);
  }
}
