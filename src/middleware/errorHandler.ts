import express from 'express';
import multer from 'multer';

export class UnsupportedFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFileError';
  }
}

// body-parser tags its errors with a `type`; malformed JSON is "entity.parse.failed"
const isBodyParseError = (err: Error): boolean =>
  'type' in err && (err.type === 'entity.parse.failed' || err.type === 'entity.too.large');

export const errorHandler = (
  err: Error,
  _req: express.Request,
  res: express.Response,
  _next: express.NextFunction
): void => {
  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ error: 'Invalid request body' });
    return;
  }
  if (err instanceof UnsupportedFileError) {
    res.status(400).json({ error: err.message });
    return;
  }

  console.error(err.stack);
  res.status(500).json({ error: err.message || 'Something went wrong' });
};
