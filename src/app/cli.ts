import { parseArgs } from 'node:util';
import { EXTREME_MAX_LEVEL, KEY_BINDINGS } from '../core/constants';
import { LIMITS, type SettingsPatch } from '../core/settings';

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliResult =
  | { help: true }
  | { help: false; patch: SettingsPatch };

const key = (k: string) => (k === ' ' ? 'space' : `'${k}'`);

export const USAGE = [
  'usage: termblocks [options]',
  '',
  'options:',
  ' -v, --vt52            VT100->VT52 mode (no colors, no scrolling)',
  ' -m, --mono            monochrome, no colors',
  ' -s, --no-scroll       redraw the board on line clears, no scrolling',
  ' -c, --single-width    one character per cell (for 8x8 fonts)',
  ' -r, --random          new random sequence on every run',
  ' -x, --extreme         unlock level 10 (one step about every 74 ms)',
  '     --seed <n>        fixed piece sequence seed',
  `     --rows <n>        board rows (${LIMITS.rows.min}-${LIMITS.rows.max})`,
  `     --cols <n>        board columns (${LIMITS.cols.min}-${LIMITS.cols.max})`,
  '     --lines-per-level <n>  cleared lines needed per level',
  '     --row-bonus <n>   extra points per cleared line',
  ' -h, --help            show this help',
  '',
  'keys:',
  ` ${key(KEY_BINDINGS.left)}  move left`,
  ` ${key(KEY_BINDINGS.right)}  move right`,
  ` ${key(KEY_BINDINGS.rotateCCW)}  rotate counter-clockwise`,
  ` ${key(KEY_BINDINGS.rotateCW)}  rotate clockwise`,
  ` ${key(KEY_BINDINGS.drop)}  drop`,
  ` ${key(KEY_BINDINGS.redraw)}  redraw the screen`,
  ` ${key(KEY_BINDINGS.start)}  start a new game (or give up the current one)`,
  ` ${key(KEY_BINDINGS.quit)}  quit (same as ctrl-c)`,
].join('\n');

function intFlag(
  name: string,
  raw: string | undefined,
  range?: { readonly min: number; readonly max: number },
): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    throw new CliError(`--${name} expects an integer, got '${raw}'`);
  }
  if (range && (value < range.min || value > range.max)) {
    throw new CliError(
      `--${name} must be within ${range.min}..${range.max}, got ${value}`,
    );
  }
  return value;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        vt52: { type: 'boolean', short: 'v' },
        mono: { type: 'boolean', short: 'm' },
        'no-scroll': { type: 'boolean', short: 's' },
        'single-width': { type: 'boolean', short: 'c' },
        random: { type: 'boolean', short: 'r' },
        extreme: { type: 'boolean', short: 'x' },
        seed: { type: 'string' },
        rows: { type: 'string' },
        cols: { type: 'string' },
        'lines-per-level': { type: 'string' },
        'row-bonus': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCli(argv: string[]): CliResult {
  const { values } = readFlags(argv);
  if (values.help) return { help: true };

  const seed = intFlag('seed', values.seed);
  if (values.random && seed !== undefined) {
    throw new CliError('--random and --seed cannot be combined');
  }

  const patch: SettingsPatch = {
    board: {
      rows: intFlag('rows', values.rows, LIMITS.rows),
      cols: intFlag('cols', values.cols, LIMITS.cols),
    },
    display: {
      protocol: values.vt52 ? 'vt52' : undefined,
      color: values.mono ? false : undefined,
      lineClear: values['no-scroll'] ? 'redraw' : undefined,
      doubleWidth: values['single-width'] ? false : undefined,
    },
    rules: {
      maxLevel: values.extreme ? EXTREME_MAX_LEVEL : undefined,
      linesPerLevel: intFlag(
        'lines-per-level',
        values['lines-per-level'],
        LIMITS.linesPerLevel,
      ),
      scorePerRow: intFlag(
        'row-bonus',
        values['row-bonus'],
        LIMITS.scorePerRow,
      ),
    },
    random: {
      seed: values.random ? null : seed,
    },
  };
  return { help: false, patch };
}
