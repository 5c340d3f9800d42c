import { type Key as InkKey } from 'ink';
import { type Direction } from '../games/snake/types';

export type Key =
  | { type: 'direction'; direction: Direction }
  | { type: 'quit' }
  | { type: 'confirm' }
  | { type: 'backspace' }
  | { type: 'char'; value: string };

/**
 * `controls` treats q and WASD as game keys; `text` passes every printable
 * character through so names can contain them.
 */
export type KeyMode = 'controls' | 'text';

const WASD: Record<string, Direction> = {
  w: 'up',
  s: 'down',
  a: 'left',
  d: 'right',
};

export type KeyFlags = Pick<
  InkKey,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'escape'
  | 'return'
  | 'backspace'
  | 'delete'
  | 'ctrl'
  | 'meta'
>;

export function mapKey(input: string, key: KeyFlags, mode: KeyMode = 'controls'): Key | null {
  if (key.upArrow) return { type: 'direction', direction: 'up' };
  if (key.downArrow) return { type: 'direction', direction: 'down' };
  if (key.leftArrow) return { type: 'direction', direction: 'left' };
  if (key.rightArrow) return { type: 'direction', direction: 'right' };
  if (key.escape) return { type: 'quit' };
  if (key.return) return { type: 'confirm' };
  if (key.backspace || key.delete) return { type: 'backspace' };
  if (key.ctrl || key.meta || input.length !== 1) return null;

  if (mode === 'controls') {
    const lower = input.toLowerCase();
    if (lower === 'q') return { type: 'quit' };
    const direction = WASD[lower];
    if (direction) return { type: 'direction', direction };
  }

  return { type: 'char', value: input };
}
