import { COLS, DEFAULT_SEED, ROWS } from './constants';
import { DEFAULT_RULES, type ProgressionRules } from './lineClear';
import type { LineClearStrategy } from './types';

export const TERMINAL_PROTOCOLS = ['vt100', 'vt52'] as const;
export type TerminalProtocol = (typeof TERMINAL_PROTOCOLS)[number];

export interface BoardSettings {
  rows: number;
  cols: number;
}

export interface DisplaySettings {
  protocol: TerminalProtocol;
  color: boolean;
  doubleWidth: boolean;
  lineClear: LineClearStrategy;
}

export interface RandomSettings {
  /** `null` seeds from the clock, so every run differs. */
  seed: number | null;
}

export interface Settings {
  board: BoardSettings;
  display: DisplaySettings;
  rules: ProgressionRules;
  random: RandomSettings;
}

export type SettingsPatch = {
  [K in keyof Settings]?: Partial<Settings[K]>;
};

export const LIMITS = {
  rows: { min: 6, max: 60 },
  cols: { min: 4, max: 31 },
  linesPerLevel: { min: 1, max: 99 },
  scorePerRow: { min: 0, max: 999 },
  maxLevel: { min: 1, max: 99 },
} as const;

export const DEFAULT_SETTINGS: Settings = {
  board: {
    rows: ROWS,
    cols: COLS,
  },
  display: {
    protocol: 'vt100',
    color: true,
    doubleWidth: true,
    lineClear: 'scroll',
  },
  rules: DEFAULT_RULES,
  random: {
    seed: DEFAULT_SEED,
  },
};

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function int(
  v: unknown,
  range: { readonly min: number; readonly max: number },
): number | undefined {
  const n = num(v);
  if (n === undefined || !Number.isInteger(n)) return undefined;
  return n >= range.min && n <= range.max ? n : undefined;
}

function bool(v: unknown): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined;
}

export function isTerminalProtocol(value: unknown): value is TerminalProtocol {
  return TERMINAL_PROTOCOLS.some((protocol) => protocol === value);
}

export function isLineClearStrategy(
  value: unknown,
): value is LineClearStrategy {
  return value === 'scroll' || value === 'redraw';
}

function mergeBoard(
  base: BoardSettings,
  patch?: Partial<BoardSettings>,
): BoardSettings {
  return {
    rows: int(patch?.rows, LIMITS.rows) ?? base.rows,
    cols: int(patch?.cols, LIMITS.cols) ?? base.cols,
  };
}

function mergeDisplay(
  base: DisplaySettings,
  patch?: Partial<DisplaySettings>,
): DisplaySettings {
  const protocol = isTerminalProtocol(patch?.protocol)
    ? patch.protocol
    : base.protocol;
  const merged: DisplaySettings = {
    protocol,
    color: bool(patch?.color) ?? base.color,
    doubleWidth: bool(patch?.doubleWidth) ?? base.doubleWidth,
    lineClear: isLineClearStrategy(patch?.lineClear)
      ? patch.lineClear
      : base.lineClear,
  };
  // a VT52 has neither colors nor scroll regions
  if (protocol === 'vt52') {
    merged.color = false;
    merged.lineClear = 'redraw';
  }
  return merged;
}

function mergeRules(
  base: ProgressionRules,
  patch?: Partial<ProgressionRules>,
): ProgressionRules {
  const speedFactor = num(patch?.speedFactor);
  const initialStepMs = num(patch?.initialStepMs);
  const minStepMs = num(patch?.minStepMs);
  return {
    scorePerPiece: num(patch?.scorePerPiece) ?? base.scorePerPiece,
    scorePerRow:
      int(patch?.scorePerRow, LIMITS.scorePerRow) ?? base.scorePerRow,
    linesPerLevel:
      int(patch?.linesPerLevel, LIMITS.linesPerLevel) ?? base.linesPerLevel,
    maxLevel: int(patch?.maxLevel, LIMITS.maxLevel) ?? base.maxLevel,
    initialStepMs:
      initialStepMs !== undefined && initialStepMs > 0
        ? initialStepMs
        : base.initialStepMs,
    speedFactor:
      speedFactor !== undefined && speedFactor > 0 && speedFactor <= 1
        ? speedFactor
        : base.speedFactor,
    minStepMs:
      minStepMs !== undefined && minStepMs > 0 ? minStepMs : base.minStepMs,
  };
}

function mergeRandom(
  base: RandomSettings,
  patch?: Partial<RandomSettings>,
): RandomSettings {
  if (patch?.seed === null) return { seed: null };
  const seed = num(patch?.seed);
  return { seed: seed === undefined ? base.seed : Math.trunc(seed) };
}

export function mergeSettings(
  base: Settings,
  patch: SettingsPatch,
): Settings {
  return {
    board: mergeBoard(base.board, patch.board),
    display: mergeDisplay(base.display, patch.display),
    rules: mergeRules(base.rules, patch.rules),
    random: mergeRandom(base.random, patch.random),
  };
}
