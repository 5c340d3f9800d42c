import { useInput } from 'ink';
import { useMemo } from 'react';
import { Frame } from '../components/Frame';
import { drawGameOver } from '../games/snake/drawGame';
import { type GameState } from '../games/snake/types';
import { BufferedScreen } from '../terminal/BufferedScreen';
import { mapKey } from '../terminal/keys';

type GameOverProps = {
  result: GameState;
  highScore: boolean;
  onContinue: () => void;
};

export const gameOverPrompt = (highScore: boolean): string =>
  highScore ? 'New high score! Press any key to enter your name' : 'Press any key to continue';

function GameOver({ result, highScore, onContinue }: GameOverProps) {
  const lines = useMemo(() => {
    const screen = new BufferedScreen(result.grid.height, result.grid.width);
    drawGameOver(screen, result, gameOverPrompt(highScore));
    return screen.lines();
  }, [result, highScore]);

  // Held arrows keep auto-repeating past the fatal move
  useInput((input, key) => {
    if (mapKey(input, key)?.type === 'direction') return;
    onContinue();
  });

  return <Frame lines={lines} />;
}

export default GameOver;
