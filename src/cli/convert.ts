import { describeImage, generatePixelRows, type ImageHeader } from '../chr/assembler';
import { CHARS_PER_ROW, CHAR_HEIGHT } from '../chr/constants';
import { ok, type Result } from '../chr/errors';
import { buildPalette, formatRgb } from '../chr/palette';
import { FileSource } from '../chr/source';
import { checkInputFile, checkOutputPath, validateInputSize } from '../chr/validate';
import { writePng } from '../png/writer';
import { parseArgs, USAGE, type CliOptions } from './args';

const TAG = '[chr2png]';

export interface CliOutput {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

// Validate everything, then decode and write. Nothing touches the output path unless every check passed.
export async function convertChrFile(options: Pick<CliOptions, 'colors' | 'input' | 'output'>): Promise<Result<ImageHeader>> {
  const palette = buildPalette(options.colors);
  if (!palette.ok) return palette;
  const size = checkInputFile(options.input);
  if (!size.ok) return size;
  const strips = validateInputSize(size.value);
  if (!strips.ok) return strips;
  const target = checkOutputPath(options.output);
  if (!target.ok) return target;

  const header = describeImage(size.value, palette.value);
  const source = new FileSource(options.input);
  try {
    await writePng(target.value, header, generatePixelRows(source));
  } finally {
    source.close();
  }
  return ok(header);
}

// Returns the process exit code: 0 ok, 1 conversion failure, 2 usage error.
export async function runCli(argv: string[], env: NodeJS.ProcessEnv, out: CliOutput = console): Promise<number> {
  const parsed = parseArgs(argv, env);
  if (!parsed.ok) {
    out.error(`${TAG} Error: ${parsed.error.message}`);
    out.error(USAGE);
    return 2;
  }
  if (parsed.value.help) {
    out.log(USAGE);
    return 0;
  }
  const opts = parsed.value;

  const result = await convertChrFile(opts);
  if (!result.ok) {
    out.error(`${TAG} Error: ${result.error.message}`);
    return 1;
  }

  const header = result.value;
  if (opts.verbose) {
    const strips = header.height / CHAR_HEIGHT;
    out.log(`${TAG} input: ${opts.input}  strips: ${strips}  tiles: ${strips * CHARS_PER_ROW}`);
    out.log(`${TAG} palette: ${header.palette.map(formatRgb).join(' ')}`);
  }
  if (!opts.quiet) {
    out.log(`${TAG} Wrote ${opts.output} (${header.width}x${header.height})`);
  }
  return 0;
}
