import { MAX_PLACEMENT_ATTEMPTS } from './constants';
import { PlacementExhaustedError } from './errors';
import { containsPosition } from './grid';
import { type Grid, type Position, type RandomSource } from './types';

type PlacementOptions = {
  random?: RandomSource;
  maxAttempts?: number;
};

/**
 * Rejection-samples `count` distinct obstacle cells, none of them in `forbidden`.
 * The attempt budget is shared across all obstacles.
 */
export function placeObstacles(
  count: number,
  grid: Grid,
  forbidden: readonly Position[],
  { random = Math.random, maxAttempts = MAX_PLACEMENT_ATTEMPTS }: PlacementOptions = {}
): Position[] {
  const obstacles: Position[] = [];
  let attempts = 0;

  while (obstacles.length < count) {
    if (attempts >= maxAttempts) {
      throw new PlacementExhaustedError('obstacles', attempts);
    }
    attempts++;

    const candidate = grid.randomObstacleCell(random);
    if (!containsPosition(forbidden, candidate) && !containsPosition(obstacles, candidate)) {
      obstacles.push(candidate);
    }
  }

  return obstacles;
}

export function placeFood(
  grid: Grid,
  snake: readonly Position[],
  obstacles: readonly Position[],
  { random = Math.random, maxAttempts = MAX_PLACEMENT_ATTEMPTS }: PlacementOptions = {}
): Position {
  for (let attempts = 0; attempts < maxAttempts; attempts++) {
    const candidate = grid.randomInterior(random);
    if (!containsPosition(snake, candidate) && !containsPosition(obstacles, candidate)) {
      return candidate;
    }
  }
  throw new PlacementExhaustedError('food', maxAttempts);
}
