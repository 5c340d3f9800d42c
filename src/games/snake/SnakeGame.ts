import { type Key } from '../../terminal/keys';
import { DIFFICULTY_SETTINGS, SCORE_PER_FOOD, SNAPSHOT_PREFIX_LENGTH } from './constants';
import { PlacementExhaustedError } from './errors';
import { createGrid } from './grid';
import { resolveInput } from './input';
import { detectCollision, step } from './movement';
import { placeFood, placeObstacles } from './placement';
import { shouldMove } from './timing';
import {
  type Difficulty,
  type GameSnapshot,
  type GameState,
  type Position,
  type RandomSource,
  type TickResult,
} from './types';

export type SnakeGameOptions = {
  difficulty: Difficulty;
  height: number;
  width: number;
  random?: RandomSource;
  startTime?: number;
};

export function initialSnake(height: number, width: number): Position[] {
  const centerRow = Math.floor(height / 2);
  const centerCol = Math.floor(width / 2);
  return [
    { row: centerRow, col: centerCol },
    { row: centerRow, col: centerCol - 1 },
    { row: centerRow, col: centerCol - 2 },
  ];
}

export function createInitialState(
  difficulty: Difficulty,
  height: number,
  width: number,
  random: RandomSource = Math.random
): GameState {
  const grid = createGrid(height, width);
  const snake = initialSnake(height, width);
  const obstacles = placeObstacles(DIFFICULTY_SETTINGS[difficulty].obstacleCount, grid, snake, {
    random,
  });

  return {
    status: 'playing',
    reason: null,
    difficulty,
    grid,
    snake,
    direction: 'right',
    food: placeFood(grid, snake, obstacles, { random }),
    obstacles,
    score: 0,
  };
}

/**
 * Holds the current game state and the timing cursor. Everything else is
 * computed by the pure helpers; each tick swaps in a new state value.
 */
export class SnakeGame {
  private gameState: GameState;
  private lastMoveTime: number;
  private readonly random: RandomSource;
  private onStateChange?: (state: GameState) => void;

  private constructor(state: GameState, startTime: number, random: RandomSource) {
    this.gameState = state;
    this.lastMoveTime = startTime;
    this.random = random;
  }

  static create({
    difficulty,
    height,
    width,
    random = Math.random,
    startTime = Date.now(),
  }: SnakeGameOptions): SnakeGame {
    return new SnakeGame(createInitialState(difficulty, height, width, random), startTime, random);
  }

  /** Wraps an existing state, mostly for tests that need a specific layout. */
  static fromState(state: GameState, startTime: number, random: RandomSource = Math.random): SnakeGame {
    return new SnakeGame(state, startTime, random);
  }

  setOnStateChange(callback: (state: GameState) => void): void {
    this.onStateChange = callback;
  }

  getState(): GameState {
    return this.gameState;
  }

  getLastMoveTime(): number {
    return this.lastMoveTime;
  }

  get moveIntervalMs(): number {
    return DIFFICULTY_SETTINGS[this.gameState.difficulty].moveIntervalMs;
  }

  /** One loop iteration: sample input, decide on a move, mutate. */
  tick(now: number, key?: Key): TickResult {
    if (this.gameState.status !== 'playing') {
      return { moved: false, state: this.gameState };
    }

    const { direction, signal } = resolveInput(this.gameState.direction, key);

    if (signal === 'quit') {
      this.update({ status: 'quit' });
      return { moved: false, state: this.gameState };
    }

    if (direction !== this.gameState.direction) {
      this.gameState = { ...this.gameState, direction };
    }

    if (!shouldMove(now, this.lastMoveTime, this.moveIntervalMs, signal === 'forceMove')) {
      return { moved: false, state: this.gameState };
    }

    this.lastMoveTime = now;
    this.move();
    return { moved: true, state: this.gameState };
  }

  getSnapshot(): GameSnapshot {
    const { score, difficulty, snake, direction, food, obstacles } = this.gameState;
    return {
      score,
      difficulty,
      snakeLength: snake.length,
      head: { ...snake[0] },
      bodyPrefix: snake.slice(1, 1 + SNAPSHOT_PREFIX_LENGTH).map((pos) => ({ ...pos })),
      direction,
      moveIntervalMs: this.moveIntervalMs,
      food: { ...food },
      obstacleCount: obstacles.length,
      obstaclePrefix: obstacles.slice(0, SNAPSHOT_PREFIX_LENGTH).map((pos) => ({ ...pos })),
    };
  }

  private move(): void {
    const { snake, direction, food, grid, obstacles } = this.gameState;
    const result = step(snake, direction, food);

    const collision = detectCollision(result.snake, grid, obstacles);
    if (collision) {
      this.update({ snake: result.snake, status: 'gameOver', reason: collision });
      return;
    }

    if (!result.ateFood) {
      this.update({ snake: result.snake });
      return;
    }

    const score = this.gameState.score + SCORE_PER_FOOD;
    try {
      const nextFood = placeFood(grid, result.snake, obstacles, { random: this.random });
      this.update({ snake: result.snake, score, food: nextFood });
    } catch (error) {
      if (!(error instanceof PlacementExhaustedError)) throw error;
      this.update({ snake: result.snake, score, status: 'gameOver', reason: 'boardFull' });
    }
  }

  private update(changes: Partial<GameState>): void {
    this.gameState = { ...this.gameState, ...changes };
    this.onStateChange?.(this.gameState);
  }
}
