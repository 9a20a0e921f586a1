export interface AppConfig {
  port: number;
  mongodbUri: string;
  maxTextLength: number;
  maxBatchSize: number;
  uploadLimitMb: number;
  persistUnmapped: boolean;
}

const toPositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

// Call after dotenv.config() so .env values are visible
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig =>
  Object.freeze({
    port: toPositiveInt(env.PORT, 3000),
    mongodbUri: env.MONGODB_URI || 'mongodb://localhost:27017/krutidev',
    maxTextLength: toPositiveInt(env.MAX_TEXT_LENGTH, 100000),
    maxBatchSize: toPositiveInt(env.MAX_BATCH_SIZE, 100),
    uploadLimitMb: toPositiveInt(env.UPLOAD_LIMIT_MB, 25),
    persistUnmapped: env.PERSIST_UNMAPPED !== 'false'
  });
