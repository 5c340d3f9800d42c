import { MIN_GRID_HEIGHT, MIN_GRID_WIDTH } from './constants';
import { GridTooSmallError } from './errors';
import { type Grid, type Position, type RandomSource } from './types';

export const randomInt = (min: number, max: number, random: RandomSource = Math.random): number =>
  min + Math.floor(random() * (max - min + 1));

export const samePosition = (a: Position, b: Position): boolean =>
  a.row === b.row && a.col === b.col;

export const containsPosition = (positions: readonly Position[], pos: Position): boolean =>
  positions.some((candidate) => samePosition(candidate, pos));

/**
 * Rectangular playfield whose outer ring is wall.
 *
 * Food may land anywhere in the interior, rows [1, H-2] x cols [1, W-2].
 * Obstacles stay off the ring next to the wall too: rows [2, H-3] x cols [2, W-3].
 */
export function createGrid(height: number, width: number): Grid {
  if (height < MIN_GRID_HEIGHT || width < MIN_GRID_WIDTH) {
    throw new GridTooSmallError(height, width, MIN_GRID_HEIGHT, MIN_GRID_WIDTH);
  }

  return {
    height,
    width,
    isWall: (pos) =>
      pos.row === 0 || pos.row === height - 1 || pos.col === 0 || pos.col === width - 1,
    randomInterior: (random = Math.random) => ({
      row: randomInt(1, height - 2, random),
      col: randomInt(1, width - 2, random),
    }),
    randomObstacleCell: (random = Math.random) => ({
      row: randomInt(2, height - 3, random),
      col: randomInt(2, width - 3, random),
    }),
  };
}
