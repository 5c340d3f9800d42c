import { DIFFICULTIES } from '../games/snake/constants';
import { type Difficulty } from '../games/snake/types';

export type LeaderboardEntry = {
  name: string;
  score: number;
};

export type Leaderboard = Record<Difficulty, LeaderboardEntry[]>;

export const MAX_SCORES = 10;
export const MAX_NAME_LENGTH = 20;

const NAME_PATTERN = /^[A-Z0-9]+$/;

export const emptyLeaderboard = (): Leaderboard => ({
  easy: [],
  medium: [],
  hard: [],
  insane: [],
});

export const normalizeName = (name: string): string => name.trim().toUpperCase();

export const isValidName = (name: string): boolean => {
  const normalized = normalizeName(name);
  return normalized.length <= MAX_NAME_LENGTH && NAME_PATTERN.test(normalized);
};

// Stable sort: an entry tying an existing score goes below it
const rank = (entries: LeaderboardEntry[]): LeaderboardEntry[] =>
  [...entries].sort((a, b) => b.score - a.score).slice(0, MAX_SCORES);

export function isHighScore(score: number, difficulty: Difficulty, board: Leaderboard): boolean {
  const entries = board[difficulty];
  if (entries.length < MAX_SCORES) return true;
  const lowest = Math.min(...entries.map((entry) => entry.score));
  return score > lowest;
}

export function addHighScore(
  name: string,
  score: number,
  difficulty: Difficulty,
  board: Leaderboard
): Leaderboard {
  const entry: LeaderboardEntry = { name: normalizeName(name), score };
  return {
    ...board,
    [difficulty]: rank([...board[difficulty], entry]),
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function parseEntry(value: unknown): LeaderboardEntry | null {
  if (!isRecord(value)) return null;
  const { name, score } = value;
  if (typeof name !== 'string' || !isValidName(name)) return null;
  if (typeof score !== 'number' || !Number.isInteger(score) || score < 0) return null;
  return { name: normalizeName(name), score };
}

/**
 * Accepts whatever came out of the leaderboard file. Entries that don't look
 * like `{ name, score }` are dropped; anything unusable becomes an empty tier.
 */
export function parseLeaderboard(raw: unknown): Leaderboard {
  const board = emptyLeaderboard();
  if (!isRecord(raw)) return board;

  DIFFICULTIES.forEach((difficulty) => {
    const entries = raw[difficulty];
    if (!Array.isArray(entries)) return;
    const valid = entries
      .map(parseEntry)
      .filter((entry): entry is LeaderboardEntry => entry !== null);
    board[difficulty] = rank(valid);
  });

  return board;
}
