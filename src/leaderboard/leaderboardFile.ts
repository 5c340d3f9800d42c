import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { type Difficulty } from '../games/snake/types';
import { addHighScore, emptyLeaderboard, parseLeaderboard, type Leaderboard } from './leaderboard';

// A missing or unreadable file just means nobody has played yet.
export async function loadLeaderboard(file: string): Promise<Leaderboard> {
  try {
    const contents = await readFile(file, 'utf8');
    return parseLeaderboard(JSON.parse(contents));
  } catch {
    return emptyLeaderboard();
  }
}

export async function saveLeaderboard(file: string, board: Leaderboard): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, `${JSON.stringify(board, null, 2)}\n`, 'utf8');
}

/**
 * Read-modify-write of one score. A failed write is logged and the updated
 * board is returned anyway, so game over never blocks on the disk.
 */
export async function submitScore(
  file: string,
  name: string,
  score: number,
  difficulty: Difficulty
): Promise<Leaderboard> {
  const current = await loadLeaderboard(file);
  const updated = addHighScore(name, score, difficulty, current);

  try {
    await saveLeaderboard(file, updated);
  } catch (error) {
    console.error('[leaderboard] Failed to save leaderboard', error);
  }

  return updated;
}
