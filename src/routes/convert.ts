import { Router } from 'express';
import { createConvertController, ConvertControllerDeps } from '../controllers/convertController';
import { validateBatchBody, validateConvertBody } from '../middleware/validate';

interface ConvertRouterOptions extends ConvertControllerDeps {
  maxTextLength: number;
  maxBatchSize: number;
}

export const createConvertRouter = ({ maxTextLength, maxBatchSize, ...deps }: ConvertRouterOptions): Router => {
  const router = Router();
  const { convertText, convertBatch, getTables, getUnmappedGlyphs } = createConvertController(deps);

  router.post('/convert', validateConvertBody(maxTextLength), convertText);
  router.post('/convert/batch', validateBatchBody(maxTextLength, maxBatchSize), convertBatch);

  // Read-only views of the tables and of what they fail to cover
  router.get('/tables', getTables);
  router.get('/glyphs/unmapped', getUnmappedGlyphs);

  return router;
};
