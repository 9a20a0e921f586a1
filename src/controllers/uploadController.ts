import { Request, Response } from 'express';
import ExcelJS from 'exceljs';
import { Converter, ResidualCodepoint, convertKrutiDevToUnicode } from '../converter';
import { GlyphReportStore, recordInBackground } from '../services/glyphReportStore';
import { logResiduals, mergeResiduals } from '../utils/diagnostics';
import { parseColumns } from '../middleware/validate';

const PREVIEW_LIMIT = 100;

interface CellConversion {
  sheet?: string;
  cell?: string; // A1-style address, or line number for text files
  original: string;
  unicode: string;
}

interface UploadResult {
  filename: string;
  kind: 'workbook' | 'text';
  cellsRead: number;
  cellsConverted: number;
  unmapped: ResidualCodepoint[];
  preview: CellConversion[];
  output?: string; // Converted text of a text file
  errors: string[];
}

export const isWorkbookFile = (file: Express.Multer.File): boolean =>
  file.originalname.toLowerCase().endsWith('.xlsx') ||
  file.mimetype === 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const isTextFile = (file: Express.Multer.File): boolean =>
  file.originalname.toLowerCase().endsWith('.txt') || file.mimetype.startsWith('text/plain');

export interface UploadControllerDeps {
  store: GlyphReportStore | null;
  convert?: Converter;
}

export const createUploadController = ({ store, convert = convertKrutiDevToUnicode }: UploadControllerDeps) => {
  const uploadFiles = async (req: Request, res: Response): Promise<void> => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];

      if (files.length === 0) {
        res.status(400).json({ error: 'No files uploaded' });
        return;
      }

      const columns = parseColumns(req.query.columns);
      const encoding = typeof req.query.encoding === 'string' ? req.query.encoding : 'utf-8';
      const results: UploadResult[] = [];

      for (const file of files) {
        const result = isWorkbookFile(file)
          ? (await convertWorkbook(file.buffer, file.originalname, convert, columns)).result
          : convertTextFile(file.buffer, file.originalname, convert, encoding);

        if (result.unmapped.length > 0) {
          logResiduals(result.unmapped, { source: file.originalname });
          recordInBackground(store, result.unmapped, file.originalname);
        }
        results.push(result);
      }

      const summary = {
        filesProcessed: results.length,
        totalCellsRead: results.reduce((sum, r) => sum + r.cellsRead, 0),
        totalCellsConverted: results.reduce((sum, r) => sum + r.cellsConverted, 0),
        unmappedTypes: mergeResiduals(results.map((r) => r.unmapped)).length,
        files: results
      };

      res.json(summary);
    } catch (error) {
      console.error('Upload error:', error);
      res.status(500).json({ error: 'File processing failed' });
    }
  };

  const exportWorkbook = async (req: Request, res: Response): Promise<void> => {
    try {
      const file = req.file;

      if (!file) {
        res.status(400).json({ error: 'No file uploaded' });
        return;
      }
      if (!isWorkbookFile(file)) {
        res.status(400).json({ error: 'Only .xlsx workbooks can be exported' });
        return;
      }

      const { workbook, result } = await convertWorkbook(
        file.buffer,
        file.originalname,
        convert,
        parseColumns(req.query.columns)
      );
      if (result.unmapped.length > 0) {
        logResiduals(result.unmapped, { source: file.originalname });
        recordInBackground(store, result.unmapped, file.originalname);
      }

      const baseName = file.originalname.replace(/\.xlsx$/i, '');
      const buffer = await workbook.xlsx.writeBuffer();
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', `attachment; filename=${encodeURIComponent(baseName)}_unicode.xlsx`);
      res.setHeader('X-Cells-Converted', String(result.cellsConverted));
      res.setHeader('X-Unmapped-Types', String(result.unmapped.length));
      res.send(buffer);
    } catch (error) {
      console.error('Export error:', error);
      res.status(500).json({ error: 'Failed to export workbook' });
    }
  };

  return { uploadFiles, exportWorkbook };
};

/**
 * Convert every text cell of a workbook in place. Rich text is converted run
 * by run so fonts and colours survive; formula cells are left alone.
 */
export async function convertWorkbook(
  buffer: Buffer,
  filename: string,
  convert: Converter,
  columns: string[] | null
): Promise<{ workbook: ExcelJS.Workbook; result: UploadResult }> {
  const result: UploadResult = {
    filename,
    kind: 'workbook',
    cellsRead: 0,
    cellsConverted: 0,
    unmapped: [],
    preview: [],
    errors: []
  };

  const workbook = new ExcelJS.Workbook();
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  await workbook.xlsx.load(buffer as any);

  if (workbook.worksheets.length === 0) {
    result.errors.push('No worksheet found');
    return { workbook, result };
  }

  console.log(`\n=== FILE: ${filename} (${workbook.worksheets.length} sheet(s)) ===`);

  const reports: ResidualCodepoint[][] = [];

  for (const worksheet of workbook.worksheets) {
    const allowed = columns ? new Set(columns.map((c) => worksheet.getColumn(c).number)) : null;

    worksheet.eachRow((row) => {
      row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
        if (allowed && !allowed.has(colNumber)) return;
        // Merged ranges share the master's value; convert it once
        if (cell.isMerged && cell.master !== cell) return;

        result.cellsRead++;
        try {
          const converted = convertCell(cell, convert);
          if (!converted) return;

          result.cellsConverted++;
          reports.push(converted.unmapped);
          if (result.preview.length < PREVIEW_LIMIT) {
            result.preview.push({
              sheet: worksheet.name,
              cell: cell.address,
              original: converted.original,
              unicode: converted.unicode
            });
          }
        } catch {
          result.errors.push(`${worksheet.name}!${cell.address}: conversion error`);
        }
      });
    });

    console.log(`Sheet "${worksheet.name}": ${result.cellsConverted} text cell(s) converted so far`);
  }

  result.unmapped = mergeResiduals(reports);
  return { workbook, result };
}

function convertCell(
  cell: ExcelJS.Cell,
  convert: Converter
): { original: string; unicode: string; unmapped: ResidualCodepoint[] } | null {
  const value = cell.value;

  if (typeof value === 'string') {
    const converted = convert(value);
    cell.value = converted.text;
    return { original: value, unicode: converted.text, unmapped: converted.unmapped };
  }

  if (value && typeof value === 'object' && 'richText' in value) {
    const runs = value.richText.map((run) => ({ run, converted: convert(run.text) }));
    cell.value = { richText: runs.map(({ run, converted }) => ({ ...run, text: converted.text })) };
    return {
      original: value.richText.map((run) => run.text).join(''),
      unicode: runs.map(({ converted }) => converted.text).join(''),
      unmapped: mergeResiduals(runs.map(({ converted }) => converted.unmapped))
    };
  }

  if (value && typeof value === 'object' && 'hyperlink' in value && typeof value.text === 'string') {
    const converted = convert(value.text);
    cell.value = { ...value, text: converted.text };
    return { original: value.text, unicode: converted.text, unmapped: converted.unmapped };
  }

  return null;
}

/**
 * Convert a plain text file one line at a time, so an i-matra marker at the
 * end of a line stays on that line (and is reported) instead of pairing with
 * the line break.
 */
export function convertTextFile(buffer: Buffer, filename: string, convert: Converter, encoding: string): UploadResult {
  const text = new TextDecoder(encoding).decode(buffer);
  // Odd entries are the line endings themselves
  const parts = text.split(/(\r?\n)/);
  const lines = parts.filter((_, i) => i % 2 === 0);
  const conversions = lines.map((line) => convert(line));

  let lineIndex = 0;
  const output = parts.map((part, i) => (i % 2 === 0 ? conversions[lineIndex++].text : part)).join('');

  const preview: CellConversion[] = [];
  for (let i = 0; i < lines.length && preview.length < PREVIEW_LIMIT; i++) {
    if (lines[i].trim().length === 0) continue;
    preview.push({ cell: `line ${i + 1}`, original: lines[i], unicode: conversions[i].text });
  }

  return {
    filename,
    kind: 'text',
    cellsRead: lines.length,
    cellsConverted: lines.filter((line) => line.trim().length > 0).length,
    unmapped: mergeResiduals(conversions.map((c) => c.unmapped)),
    preview,
    output,
    errors: []
  };
}
