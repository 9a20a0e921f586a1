import fs from 'fs';
import { parseArgs } from 'util';
import { convertKrutiDevToUnicode } from './converter';
import { logResiduals } from './utils/diagnostics';
import { isSupportedEncoding } from './middleware/validate';

// Shown when no file or piped input is given
export const SAMPLE_TEXT = '¤ÉÉiÉ +ÉÉè® BÉDªÉÉ cÉä ';

const RULE = '='.repeat(70);

export const USAGE = [
  'Usage: krutidev [file] [options]',
  '',
  'Converts Kruti Dev encoded text to Unicode Devanagari.',
  'Reads the file if given, otherwise piped stdin, otherwise a built-in sample.',
  '',
  'Options:',
  '  -e, --encoding <label>  Input encoding (default utf-8, e.g. windows-1252)',
  '      --json              Print the conversion result as JSON',
  '      --strict            Exit with status 1 if unconverted characters remain',
  '  -h, --help              Show this message'
].join('\n');

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  readFile: (path: string) => Buffer;
  readStdin: () => Promise<Buffer | null>;
}

const readPipedStdin = async (): Promise<Buffer | null> => {
  if (process.stdin.isTTY) return null;
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return chunks.length > 0 ? Buffer.concat(chunks) : null;
};

export const nodeIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readFile: (path) => fs.readFileSync(path),
  readStdin: readPipedStdin
};

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      encoding: { type: 'string', short: 'e', default: 'utf-8' },
      json: { type: 'boolean', default: false },
      strict: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

/** Returns the process exit code. */
export async function runCli(argv: string[], io: CliIO = nodeIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const encoding = values.encoding ?? 'utf-8';
  if (!isSupportedEncoding(encoding)) {
    io.err(`Unsupported encoding: ${encoding}`);
    return 2;
  }

  let input: string;
  try {
    const [file] = positionals;
    const raw = file ? io.readFile(file) : await io.readStdin();
    input = raw ? new TextDecoder(encoding).decode(raw) : SAMPLE_TEXT;
  } catch (error) {
    io.err(`Cannot read input: ${error instanceof Error ? error.message : String(error)}`);
    return 2;
  }

  const result = convertKrutiDevToUnicode(input);

  if (values.json) {
    io.out(JSON.stringify(result, null, 2));
  } else {
    io.out(RULE);
    io.out('KRUTI DEV TO UNICODE CONVERTER');
    io.out(RULE);
    io.out(`\nOriginal (Kruti Dev):\n${input}\n`);
    io.out(RULE);
    io.out('CONVERTED (Unicode Hindi):');
    io.out(RULE);
    io.out(result.text);
    io.out(RULE);
  }

  logResiduals(result.unmapped, { write: io.err });

  return values.strict && result.unmapped.length > 0 ? 1 : 0;
}
