import { Request, Response } from 'express';
import { Converter, ConverterTables, KRUTI_DEV_TABLES, createConverter, listTables } from '../converter';
import { GlyphReportStore, recordInBackground } from '../services/glyphReportStore';
import { logResiduals, mergeResiduals } from '../utils/diagnostics';
import { parseLimit } from '../middleware/validate';

export interface ConvertControllerDeps {
  store: GlyphReportStore | null;
  /** Tables served by GET /tables and, unless `convert` is given, used to convert */
  tables?: ConverterTables;
  convert?: Converter;
}

export const createConvertController = ({
  store,
  tables = KRUTI_DEV_TABLES,
  convert = createConverter(tables)
}: ConvertControllerDeps) => {
  const convertText = async (req: Request, res: Response): Promise<void> => {
    try {
      const { text, source }: { text: string; source?: string } = req.body;
      const result = convert(text);

      if (result.unmapped.length > 0) {
        logResiduals(result.unmapped, { source: source || 'api/convert' });
        recordInBackground(store, result.unmapped, source || 'api/convert');
      }

      res.json({ original: text, unicode: result.text, unmapped: result.unmapped });
    } catch (error) {
      console.error('Convert error:', error);
      res.status(500).json({ error: 'Conversion failed' });
    }
  };

  const convertBatch = async (req: Request, res: Response): Promise<void> => {
    try {
      const { texts, source }: { texts: string[]; source?: string } = req.body;
      const results = texts.map((text) => {
        const result = convert(text);
        return { original: text, unicode: result.text, unmapped: result.unmapped };
      });

      const unmapped = mergeResiduals(results.map((r) => r.unmapped));
      if (unmapped.length > 0) {
        logResiduals(unmapped, { source: source || 'api/convert/batch' });
        recordInBackground(store, unmapped, source || 'api/convert/batch');
      }

      res.json({ count: results.length, results, unmappedTypes: unmapped.length });
    } catch (error) {
      console.error('Batch convert error:', error);
      res.status(500).json({ error: 'Conversion failed' });
    }
  };

  const getTables = async (_req: Request, res: Response): Promise<void> => {
    res.json({ tables: listTables(tables) });
  };

  const getUnmappedGlyphs = async (req: Request, res: Response): Promise<void> => {
    if (!store) {
      res.status(503).json({ error: 'Unmapped glyph tracking is disabled' });
      return;
    }

    try {
      const limit = parseLimit(req.query.limit, 50, 500);
      const glyphs = await store.list(limit);
      res.json({ count: glyphs.length, glyphs });
    } catch (error) {
      console.error('Unmapped glyph list error:', error);
      res.status(500).json({ error: 'Failed to fetch unmapped glyphs' });
    }
  };

  return { convertText, convertBatch, getTables, getUnmappedGlyphs };
};
