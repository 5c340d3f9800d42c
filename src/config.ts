import { homedir } from 'node:os';
import { join } from 'node:path';
import { LOOP_SLEEP_MS } from './games/snake/constants';

export type AppConfig = {
  leaderboardFile: string;
  crashReportDir: string;
  tickMs: number;
};

const DEFAULT_CONFIG: AppConfig = {
  leaderboardFile: join(homedir(), '.snake_leaderboard.json'),
  crashReportDir: process.cwd(),
  tickMs: LOOP_SLEEP_MS,
};

function parseTickMs(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[config] Ignoring SNAKE_TICK_MS=${value}: expected a positive integer`);
    return undefined;
  }
  return parsed;
}

function fromEnv(env: NodeJS.ProcessEnv): Partial<AppConfig> {
  const config: Partial<AppConfig> = {};
  if (env.SNAKE_LEADERBOARD_FILE) config.leaderboardFile = env.SNAKE_LEADERBOARD_FILE;
  if (env.SNAKE_CRASH_DIR) config.crashReportDir = env.SNAKE_CRASH_DIR;
  const tickMs = parseTickMs(env.SNAKE_TICK_MS);
  if (tickMs !== undefined) config.tickMs = tickMs;
  return config;
}

/** Defaults, then environment, then explicit overrides. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<AppConfig>
): AppConfig {
  return { ...DEFAULT_CONFIG, ...fromEnv(env), ...overrides };
}
