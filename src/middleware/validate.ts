import { Request, Response, NextFunction, RequestHandler } from 'express';

// Worksheet column letters, e.g. "B" or "AA"
const COLUMN_REGEX = /^[A-Z]{1,3}$/;

export const parseColumns = (raw: unknown): string[] | null => {
  if (typeof raw !== 'string' || raw.trim().length === 0) return null;
  const columns = raw.split(',').map((c) => c.trim().toUpperCase()).filter((c) => c.length > 0);
  return columns.every((c) => COLUMN_REGEX.test(c)) ? columns : null;
};

export const parseLimit = (raw: unknown, fallback: number, max: number): number => {
  const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, max);
};

export const isSupportedEncoding = (label: string): boolean => {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
};

const validateSource = (source: unknown): string | null => {
  if (source === undefined) return null;
  if (typeof source !== 'string' || source.length > 200) {
    return 'source must be a string of at most 200 characters.';
  }
  return null;
};

export const validateConvertBody = (maxTextLength: number): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    const { text, source } = req.body ?? {};

    if (typeof text !== 'string') {
      res.status(400).json({ error: 'text is required and must be a string.' });
      return;
    }
    if (text.length > maxTextLength) {
      res.status(400).json({ error: `text exceeds the maximum length of ${maxTextLength} characters.` });
      return;
    }

    const sourceError = validateSource(source);
    if (sourceError) {
      res.status(400).json({ error: sourceError });
      return;
    }

    next();
  };

export const validateBatchBody = (maxTextLength: number, maxBatchSize: number): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    const { texts, source } = req.body ?? {};

    if (!Array.isArray(texts) || texts.length === 0) {
      res.status(400).json({ error: 'texts is required and must be a non-empty array.' });
      return;
    }
    if (texts.length > maxBatchSize) {
      res.status(400).json({ error: `texts may contain at most ${maxBatchSize} items.` });
      return;
    }

    const badIndex = texts.findIndex((t: unknown) => typeof t !== 'string' || t.length > maxTextLength);
    if (badIndex !== -1) {
      res.status(400).json({ error: `texts[${badIndex}] must be a string of at most ${maxTextLength} characters.` });
      return;
    }

    const sourceError = validateSource(source);
    if (sourceError) {
      res.status(400).json({ error: sourceError });
      return;
    }

    next();
  };

export const validateUploadQuery = (req: Request, res: Response, next: NextFunction): void => {
  const { columns, encoding } = req.query;

  if (columns !== undefined && !parseColumns(columns)) {
    res.status(400).json({ error: 'columns must be a comma-separated list of column letters, e.g. B,C.' });
    return;
  }
  if (encoding !== undefined && (typeof encoding !== 'string' || !isSupportedEncoding(encoding))) {
    res.status(400).json({ error: 'Unsupported encoding.' });
    return;
  }

  next();
};
