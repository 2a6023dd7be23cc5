import { fail, ok, type Result } from '../chr/errors';
import { DEFAULT_COLOR_CODES, type ColorCodes } from '../chr/palette';

export interface CliOptions {
  colors: ColorCodes;
  input: string;
  output: string;
  verbose: boolean;
  quiet: boolean;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

export const USAGE = `Converts an NES CHR (graphics) data file to a PNG file.

Usage: chr2png [--color0=RRGGBB] [--color1=RRGGBB] [--color2=RRGGBB] [--color3=RRGGBB] <input.chr> <output.png>

  --colorN=RRGGBB   PNG color for CHR color N (defaults ${DEFAULT_COLOR_CODES.join(' ')})
  --verbose         print image details
  --quiet           print nothing on success
  --help            show this help

Environment: CHR2PNG_COLOR0..CHR2PNG_COLOR3, CHR2PNG_VERBOSE=1`;

const COLOR_FLAGS = ['color0', 'color1', 'color2', 'color3'] as const;
type ColorFlag = (typeof COLOR_FLAGS)[number];

function isColorFlag(name: string): name is ColorFlag {
  return (COLOR_FLAGS as readonly string[]).includes(name);
}

// Flags win over environment, environment over built-in defaults.
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = {}): Result<ParsedArgs> {
  const colors: string[] = COLOR_FLAGS.map((flag, i) => env[`CHR2PNG_${flag.toUpperCase()}`] ?? DEFAULT_COLOR_CODES[i]);
  const positionals: string[] = [];
  let verbose = (env.CHR2PNG_VERBOSE ?? '0') !== '0';
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!a.startsWith('--') || a === '-') {
      positionals.push(a);
      continue;
    }
    const m = a.match(/^--([^=]+)(?:=(.*))?$/);
    const name = m ? m[1] : a.slice(2);
    let value: string | undefined = m ? m[2] : undefined;

    if (name === 'help') return ok({ help: true });
    if (name === 'verbose') { verbose = true; continue; }
    if (name === 'quiet') { quiet = true; continue; }
    if (!isColorFlag(name)) return fail('Usage', `unknown option: ${a}`);

    if (value === undefined) {
      if (i + 1 >= argv.length) return fail('Usage', `--${name} requires a value`);
      value = argv[++i];
    }
    colors[COLOR_FLAGS.indexOf(name)] = value;
  }

  if (positionals.length !== 2) {
    return fail('Usage', `expected <input> and <output> paths, got ${positionals.length} argument(s)`);
  }
  return ok({
    help: false,
    colors: [colors[0], colors[1], colors[2], colors[3]],
    input: positionals[0],
    output: positionals[1],
    verbose,
    quiet,
  });
}
