import { useApp, useStdout } from 'ink';
import { useCallback } from 'react';
import { GameScreen } from './components/GameScreen';
import { type AppConfig } from './config';
import { isSetupError, type GameCrashError } from './games/snake/errors';
import { SnakeGame } from './games/snake/SnakeGame';
import { type Difficulty } from './games/snake/types';
import { submitScore } from './leaderboard/leaderboardFile';
import GameOver from './pages/GameOver';
import LeaderboardView from './pages/LeaderboardView';
import Menu from './pages/Menu';
import NameEntry from './pages/NameEntry';
import SetupError from './pages/SetupError';
import { useAppStore } from './state/appStore';

const FALLBACK_ROWS = 24;
const FALLBACK_COLUMNS = 80;

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

type AppProps = {
  config: AppConfig;
};

function App({ config }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const screen = useAppStore((state) => state.screen);
  const leaderboard = useAppStore((state) => state.leaderboard);
  const setLeaderboard = useAppStore((state) => state.setLeaderboard);
  const startGame = useAppStore((state) => state.startGame);
  const showSetupError = useAppStore((state) => state.showSetupError);
  const finishGame = useAppStore((state) => state.finishGame);
  const continueFromGameOver = useAppStore((state) => state.continueFromGameOver);
  const showLeaderboard = useAppStore((state) => state.showLeaderboard);
  const backToMenu = useAppStore((state) => state.backToMenu);

  const handleSelect = useCallback(
    (difficulty: Difficulty) => {
      // Leave the last terminal row free so ink never scrolls the board
      const height = (stdout.rows || FALLBACK_ROWS) - 1;
      const width = stdout.columns || FALLBACK_COLUMNS;
      try {
        startGame(SnakeGame.create({ difficulty, height, width }));
      } catch (error) {
        if (isSetupError(error)) {
          showSetupError(error.message);
          return;
        }
        exit(toError(error));
      }
    },
    [stdout, startGame, showSetupError, exit]
  );

  const handleCrash = useCallback((error: GameCrashError) => exit(error), [exit]);

  const handleSubmitName = useCallback(
    (difficulty: Difficulty, score: number, name: string) => {
      submitScore(config.leaderboardFile, name, score, difficulty)
        .then((board) => {
          setLeaderboard(board);
          showLeaderboard(difficulty);
        })
        .catch((error: unknown) => exit(toError(error)));
    },
    [config.leaderboardFile, setLeaderboard, showLeaderboard, exit]
  );

  switch (screen.name) {
    case 'menu':
      return (
        <Menu
          onSelect={handleSelect}
          onShowLeaderboard={() => showLeaderboard('easy')}
          onQuit={() => exit()}
        />
      );
    case 'playing':
      return (
        <GameScreen
          game={screen.game}
          tickMs={config.tickMs}
          onFinish={finishGame}
          onCrash={handleCrash}
        />
      );
    case 'setupError':
      return <SetupError message={screen.message} onBack={backToMenu} />;
    case 'gameOver':
      return (
        <GameOver result={screen.result} highScore={screen.highScore} onContinue={continueFromGameOver} />
      );
    case 'nameEntry':
      return (
        <NameEntry
          difficulty={screen.difficulty}
          score={screen.score}
          onSubmit={(name) => handleSubmitName(screen.difficulty, screen.score, name)}
          onSkip={() => showLeaderboard(screen.difficulty)}
        />
      );
    case 'leaderboard':
      return (
        <LeaderboardView
          difficulty={screen.difficulty}
          leaderboard={leaderboard}
          onChangeDifficulty={showLeaderboard}
          onBack={backToMenu}
        />
      );
  }
}

export default App;
