import { type Difficulty, type DifficultySettings } from './types';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard', 'insane'];

export const DIFFICULTY_SETTINGS: Record<Difficulty, DifficultySettings> = {
  easy: { label: 'Easy', obstacleCount: 0, moveIntervalMs: 600 },
  medium: { label: 'Medium', obstacleCount: 5, moveIntervalMs: 300 },
  hard: { label: 'Hard', obstacleCount: 10, moveIntervalMs: 200 },
  insane: { label: 'Insane', obstacleCount: 15, moveIntervalMs: 50 },
};

// Forced moves (re-pressing a direction) can't go faster than 20 per second.
export const MIN_FORCED_MOVE_MS = 50;

// Idle sleep between loop iterations, only there to keep CPU usage down.
export const LOOP_SLEEP_MS = 10;

export const SCORE_PER_FOOD = 10;

export const MAX_PLACEMENT_ATTEMPTS = 10_000;

export const MIN_GRID_HEIGHT = 10;
export const MIN_GRID_WIDTH = 20;

export const SNAPSHOT_PREFIX_LENGTH = 5;

export const GLYPHS = {
  head: '@',
  body: '*',
  obstacle: '█',
  food: '#',
  empty: ' ',
  horizontal: '─',
  vertical: '│',
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
} as const;

export const INSTRUCTIONS = "Arrow keys: change/boost direction, 'q': quit";
