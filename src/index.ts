import dotenv from 'dotenv';
import mongoose from 'mongoose';
import YAML from 'yamljs';
import path from 'path';

import { createApp } from './app';
import { loadConfig } from './config';
import { MongoGlyphReportStore } from './services/glyphReportStore';

dotenv.config();

const config = loadConfig();

// swagger.yaml sits at the project root, one level above both src/ and dist/
const swaggerDocument = YAML.load(path.join(__dirname, '..', 'swagger.yaml'));

const store = config.persistUnmapped ? new MongoGlyphReportStore() : null;
const app = createApp({ config, store, swaggerDocument });

// Start server first, then connect to database
app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
  console.log(`API docs available at http://localhost:${config.port}/api-docs`);
});

// Database connection (non-blocking); only glyph tracking needs it
if (store) {
  mongoose
    .connect(config.mongodbUri)
    .then(() => {
      console.log('Connected to MongoDB');
    })
    .catch((err) => {
      console.error('MongoDB connection error:', err);
    });
}

export default app;
