import { MIN_FORCED_MOVE_MS } from './constants';

/**
 * A move is due once the interval has elapsed, or earlier on a forced move
 * as long as the last one was at least MIN_FORCED_MOVE_MS ago.
 */
export function shouldMove(
  now: number,
  lastMoveTime: number,
  moveIntervalMs: number,
  forceMove: boolean
): boolean {
  const elapsed = now - lastMoveTime;
  if (elapsed >= moveIntervalMs) return true;
  return forceMove && elapsed >= MIN_FORCED_MOVE_MS;
}
