import { ResidualCodepoint, ResidualReason } from '../converter';
import UnmappedGlyph from '../models/UnmappedGlyph';

export interface GlyphReport {
  char: string;
  codepoint: number;
  label: string;
  reason: ResidualReason;
  occurrences: number;
  sources: string[];
  firstSeenAt: Date;
  lastSeenAt: Date;
}

/** Tally of residual glyphs seen across conversions. */
export interface GlyphReportStore {
  record(unmapped: readonly ResidualCodepoint[], source: string): Promise<void>;
  list(limit: number): Promise<GlyphReport[]>;
}

const MAX_SOURCES = 20;

export class MongoGlyphReportStore implements GlyphReportStore {
  async record(unmapped: readonly ResidualCodepoint[], source: string): Promise<void> {
    if (unmapped.length === 0) return;

    const now = new Date();
    const bulkOps = unmapped.map((r) => ({
      updateOne: {
        filter: { codepoint: r.codepoint },
        update: {
          $inc: { occurrences: r.count },
          $set: { lastSeenAt: now, reason: r.reason },
          $push: { sources: { $each: [source], $slice: -MAX_SOURCES } },
          $setOnInsert: {
            char: r.char,
            codepoint: r.codepoint,
            label: r.label,
            firstSeenAt: now
          }
        },
        upsert: true
      }
    }));

    await UnmappedGlyph.bulkWrite(bulkOps, { ordered: false });
  }

  async list(limit: number): Promise<GlyphReport[]> {
    const glyphs = await UnmappedGlyph.find().sort({ occurrences: -1, codepoint: 1 }).limit(limit);
    return glyphs.map((g) => ({
      char: g.char,
      codepoint: g.codepoint,
      label: g.label,
      reason: g.reason,
      occurrences: g.occurrences,
      sources: g.sources,
      firstSeenAt: g.firstSeenAt,
      lastSeenAt: g.lastSeenAt
    }));
  }
}

// Fire-and-forget recording; failures are logged and never reach the caller
export const recordInBackground = (
  store: GlyphReportStore | null,
  unmapped: readonly ResidualCodepoint[],
  source: string
): void => {
  if (!store || unmapped.length === 0) return;
  store.record(unmapped, source).catch((err: unknown) => {
    console.error('Failed to record unmapped glyphs:', err);
  });
};
