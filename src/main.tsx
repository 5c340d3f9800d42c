import { render } from 'ink';
import App from './App';
import { loadConfig, type AppConfig } from './config';
import { writeCrashReport } from './diagnostics/crashReport';
import { GameCrashError } from './games/snake/errors';
import { loadLeaderboard } from './leaderboard/leaderboardFile';
import { useAppStore } from './state/appStore';
import { withTerminal } from './terminal/session';

async function run(config: AppConfig): Promise<void> {
  useAppStore.getState().setLeaderboard(await loadLeaderboard(config.leaderboardFile));

  await withTerminal(process.stdout, async () => {
    const app = render(<App config={config} />);
    await app.waitUntilExit();
  });

  console.log(`\nThanks for playing! Final score: ${useAppStore.getState().lastScore}`);
}

async function reportCrash(config: AppConfig, error: unknown): Promise<void> {
  const snapshot = error instanceof GameCrashError ? error.snapshot : null;
  const cause = error instanceof GameCrashError ? error.cause : error;
  console.error('[main] Snake crashed', cause);

  try {
    const file = await writeCrashReport(config.crashReportDir, snapshot, cause);
    console.error(`[main] Crash report written to ${file}`);
  } catch (reportError) {
    console.error('[main] Failed to write crash report', reportError);
  }
  process.exitCode = 1;
}

(async () => {
  const config = loadConfig();
  try {
    await run(config);
  } catch (error) {
    await reportCrash(config, error);
  }
})();
