import { useInput } from 'ink';
import { useEffect, useMemo, useState } from 'react';
import { drawGame } from '../games/snake/drawGame';
import { GameCrashError } from '../games/snake/errors';
import { type SnakeGame } from '../games/snake/SnakeGame';
import { type GameState } from '../games/snake/types';
import { BufferedScreen } from '../terminal/BufferedScreen';
import { mapKey } from '../terminal/keys';
import { Frame } from './Frame';

type GameScreenProps = {
  game: SnakeGame;
  tickMs: number;
  onFinish: (result: GameState) => void;
  onCrash: (error: GameCrashError) => void;
};

const paint = (screen: BufferedScreen, state: GameState): string[] => {
  screen.clear();
  drawGame(screen, state);
  return screen.lines();
};

export function GameScreen({ game, tickMs, onFinish, onCrash }: GameScreenProps) {
  const screen = useMemo(() => {
    const { height, width } = game.getState().grid;
    return new BufferedScreen(height, width);
  }, [game]);
  const [lines, setLines] = useState(() => paint(screen, game.getState()));

  useInput((input, key) => {
    const mapped = mapKey(input, key);
    if (mapped) screen.pushKey(mapped);
  });

  useEffect(() => {
    let timer: ReturnType<typeof setTimeout> | null = null;
    let stopped = false;

    game.setOnStateChange((state) => setLines(paint(screen, state)));

    // One key per tick; everything else waits for the next iteration
    const loop = () => {
      timer = null;
      let state: GameState;
      try {
        state = game.tick(Date.now(), screen.pollKey()).state;
      } catch (error) {
        onCrash(new GameCrashError(game.getSnapshot(), error));
        return;
      }

      if (state.status !== 'playing') {
        onFinish(state);
        return;
      }
      if (!stopped) timer = setTimeout(loop, tickMs);
    };

    timer = setTimeout(loop, tickMs);
    return () => {
      stopped = true;
      if (timer) clearTimeout(timer);
      game.setOnStateChange(() => undefined);
    };
  }, [game, screen, tickMs, onFinish, onCrash]);

  return <Frame lines={lines} />;
}
