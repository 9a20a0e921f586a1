import mongoose, { Document } from 'mongoose';

export interface IUnmappedGlyph extends Document {
  char: string;
  codepoint: number;
  label: string; // U+XXXX
  reason: 'out-of-range' | 'dangling-marker';
  occurrences: number;
  sources: string[];
  firstSeenAt: Date;
  lastSeenAt: Date;
}

const UnmappedGlyphSchema = new mongoose.Schema({
  char: {
    type: String,
    required: true
  },
  codepoint: {
    type: Number,
    required: true,
    unique: true,
    index: true
  },
  label: {
    type: String,
    required: true
  },
  reason: {
    type: String,
    enum: ['out-of-range', 'dangling-marker'],
    default: 'out-of-range'
  },
  occurrences: {
    type: Number,
    default: 0
  },
  // Capped in the store so one noisy glyph does not grow without bound
  sources: {
    type: [String],
    default: []
  },
  firstSeenAt: {
    type: Date,
    default: Date.now
  },
  lastSeenAt: {
    type: Date,
    default: Date.now
  }
});

UnmappedGlyphSchema.index({ occurrences: -1 });

export default mongoose.model<IUnmappedGlyph>('UnmappedGlyph', UnmappedGlyphSchema);
