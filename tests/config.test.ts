import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      mongodbUri: 'mongodb://localhost:27017/krutidev',
      maxTextLength: 100000,
      maxBatchSize: 100,
      uploadLimitMb: 25,
      persistUnmapped: true
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      MONGODB_URI: 'mongodb://db:27017/test',
      MAX_TEXT_LENGTH: '500',
      MAX_BATCH_SIZE: '5',
      UPLOAD_LIMIT_MB: '2',
      PERSIST_UNMAPPED: 'false'
    });

    expect(config).toEqual({
      port: 8080,
      mongodbUri: 'mongodb://db:27017/test',
      maxTextLength: 500,
      maxBatchSize: 5,
      uploadLimitMb: 2,
      persistUnmapped: false
    });
  });

  it('falls back to defaults for invalid numbers', () => {
    const config = loadConfig({ PORT: 'abc', MAX_TEXT_LENGTH: '-4', MAX_BATCH_SIZE: '0' });
    expect(config.port).toBe(3000);
    expect(config.maxTextLength).toBe(100000);
    expect(config.maxBatchSize).toBe(100);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
