import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type GameSnapshot, type Position } from '../games/snake/types';

const pad = (value: number): string => String(value).padStart(2, '0');

const formatPosition = (pos: Position): string => `(${pos.row}, ${pos.col})`;

const formatPositions = (positions: Position[]): string =>
  positions.length === 0 ? '[]' : `[${positions.map(formatPosition).join(', ')}]`;

/** `YYYYMMDD_HHMMSS` in local time. */
export const crashTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export function formatCrashReport(snapshot: GameSnapshot | null, error: unknown, date: Date): string {
  const lines = ['SNAKE GAME CRASH REPORT', `Time: ${date.toISOString()}`, '', '== Game state =='];

  if (snapshot) {
    lines.push(
      `Score: ${snapshot.score}`,
      `Difficulty: ${snapshot.difficulty}`,
      `Snake length: ${snapshot.snakeLength}`,
      `Snake head: ${formatPosition(snapshot.head)}`,
      `Snake body (first ${snapshot.bodyPrefix.length}): ${formatPositions(snapshot.bodyPrefix)}`,
      `Direction: ${snapshot.direction}`,
      `Move interval: ${snapshot.moveIntervalMs}ms`,
      `Food: ${formatPosition(snapshot.food)}`,
      `Obstacles: ${snapshot.obstacleCount}`,
      `Obstacles (first ${snapshot.obstaclePrefix.length}): ${formatPositions(snapshot.obstaclePrefix)}`
    );
  } else {
    lines.push('No game in progress');
  }

  lines.push('', '== Error ==');
  if (error instanceof Error) {
    lines.push(`Type: ${error.name}`, `Message: ${error.message}`, '', error.stack ?? '(no stack)');
  } else {
    lines.push('Type: unknown', `Message: ${String(error)}`);
  }

  return `${lines.join('\n')}\n`;
}

export async function writeCrashReport(
  dir: string,
  snapshot: GameSnapshot | null,
  error: unknown,
  date: Date = new Date()
): Promise<string> {
  const file = join(dir, `snake_crash_${crashTimestamp(date)}.txt`);
  await mkdir(dir, { recursive: true });
  await writeFile(file, formatCrashReport(snapshot, error, date), 'utf8');
  return file;
}
