import { containsPosition, samePosition } from './grid';
import {
  type CollisionReason,
  type Direction,
  type Grid,
  type Position,
  type StepResult,
} from './types';

const OFFSETS: Record<Direction, Position> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

export const nextHead = (head: Position, direction: Direction): Position => ({
  row: head.row + OFFSETS[direction].row,
  col: head.col + OFFSETS[direction].col,
});

/**
 * Advances the snake one cell. Eating keeps the old tail, so the snake grows by one.
 */
export function step(snake: readonly Position[], direction: Direction, food: Position): StepResult {
  const [head] = snake;
  if (!head) {
    throw new Error('Snake has no segments');
  }

  const newHead = nextHead(head, direction);
  const ateFood = samePosition(newHead, food);
  const body = ateFood ? snake : snake.slice(0, -1);

  return { snake: [newHead, ...body], ateFood };
}

/** Checks the head (index 0) of an already-stepped snake. */
export function detectCollision(
  snake: readonly Position[],
  grid: Grid,
  obstacles: readonly Position[]
): CollisionReason | null {
  const [head, ...body] = snake;
  if (!head) return null;

  if (grid.isWall(head)) return 'wall';
  if (containsPosition(body, head)) return 'self';
  if (containsPosition(obstacles, head)) return 'obstacle';
  return null;
}

export const checkCollision = (
  snake: readonly Position[],
  grid: Grid,
  obstacles: readonly Position[]
): boolean => detectCollision(snake, grid, obstacles) !== null;
