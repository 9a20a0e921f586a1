import express from 'express';
import cors from 'cors';
import mongoose from 'mongoose';
import swaggerUi, { JsonObject } from 'swagger-ui-express';

import { AppConfig } from './config';
import { createConvertRouter } from './routes/convert';
import { createUploadRouter } from './routes/upload';
import { errorHandler } from './middleware/errorHandler';
import { GlyphReportStore } from './services/glyphReportStore';

export interface AppOptions {
  config: AppConfig;
  store: GlyphReportStore | null;
  swaggerDocument?: JsonObject;
}

export const createApp = ({ config, store, swaggerDocument }: AppOptions): express.Express => {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // Swagger API Documentation
  if (swaggerDocument) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'Kruti Dev Converter API Documentation'
    }));
  }

  app.get('/', (_req, res) => {
    res.json({ message: 'Kruti Dev to Unicode Converter API', status: 'ok', docs: '/api-docs' });
  });

  // The converter itself has no dependencies, so a missing database only degrades glyph tracking
  app.get('/health', (_req, res) => {
    const isDbConnected = mongoose.connection.readyState === 1;
    res.status(200).json({
      status: isDbConnected || !store ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: isDbConnected ? 'connected' : 'disconnected'
    });
  });

  app.use('/api', createConvertRouter({
    store,
    maxTextLength: config.maxTextLength,
    maxBatchSize: config.maxBatchSize
  }));
  app.use('/api/upload', createUploadRouter({ store, uploadLimitMb: config.uploadLimitMb }));

  app.use(errorHandler);

  return app;
};
