import { type Key } from '../../terminal/keys';
import { type Direction, type InputResolution } from './types';

export const OPPOSITE: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

/**
 * Applies one sampled key to the current heading.
 *
 * Same direction or a legal turn asks for an immediate move; a reversal is dropped
 * without a signal, since it would run the head into the neck.
 */
export function resolveInput(current: Direction, key: Key | undefined): InputResolution {
  if (!key) {
    return { direction: current, signal: null };
  }

  if (key.type === 'quit') {
    return { direction: current, signal: 'quit' };
  }

  if (key.type !== 'direction') {
    return { direction: current, signal: null };
  }

  if (key.direction === OPPOSITE[current]) {
    return { direction: current, signal: null };
  }

  return { direction: key.direction, signal: 'forceMove' };
}
