import { CTRL_C, KEY_BINDINGS } from '../core/constants';
import type { Command } from '../core/types';

type BoundCommand = keyof typeof KEY_BINDINGS;

const BOUND: readonly BoundCommand[] = [
  'left',
  'right',
  'rotateCCW',
  'rotateCW',
  'drop',
  'redraw',
  'start',
  'quit',
];

const BY_BYTE = new Map<number, Command>([
  ...BOUND.map((command): [number, Command] => [
    KEY_BINDINGS[command].charCodeAt(0),
    command,
  ]),
  [CTRL_C, 'quit'],
]);

/** Unknown bytes are `none`, never an error. */
export function commandFromByte(byte: number): Command {
  return BY_BYTE.get(byte) ?? 'none';
}
