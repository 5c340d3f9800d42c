import { type GameSnapshot } from './types';

export class PlacementExhaustedError extends Error {
  readonly attempts: number;

  constructor(what: string, attempts: number) {
    super(`Could not place ${what} after ${attempts} attempts: the playfield is too crowded`);
    this.name = 'PlacementExhaustedError';
    this.attempts = attempts;
  }
}

export class GridTooSmallError extends Error {
  readonly height: number;
  readonly width: number;

  constructor(height: number, width: number, minHeight: number, minWidth: number) {
    super(
      `Terminal is too small (${width}x${height}); Snake needs at least ${minWidth}x${minHeight}`
    );
    this.name = 'GridTooSmallError';
    this.height = height;
    this.width = width;
  }
}

/** A tick failed mid-game; carries the game as it was for the crash report. */
export class GameCrashError extends Error {
  readonly snapshot: GameSnapshot;

  constructor(snapshot: GameSnapshot, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Game crashed: ${detail}`, { cause });
    this.name = 'GameCrashError';
    this.snapshot = snapshot;
  }
}

export const isSetupError = (error: unknown): error is PlacementExhaustedError | GridTooSmallError =>
  error instanceof PlacementExhaustedError || error instanceof GridTooSmallError;
