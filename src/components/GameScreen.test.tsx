import { render } from 'ink-testing-library';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { GameCrashError } from '../games/snake/errors';
import { createGrid } from '../games/snake/grid';
import { SnakeGame } from '../games/snake/SnakeGame';
import { type GameState } from '../games/snake/types';
import { GameScreen } from './GameScreen';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const newGame = () => {
  const state: GameState = {
    status: 'playing',
    reason: null,
    difficulty: 'easy',
    grid: createGrid(10, 40),
    snake: [
      { row: 5, col: 10 },
      { row: 5, col: 9 },
      { row: 5, col: 8 },
    ],
    direction: 'right',
    food: { row: 2, col: 30 },
    obstacles: [],
    score: 0,
  };
  return SnakeGame.fromState(state, Date.now());
};

describe('GameScreen', () => {
  let cleanup: (() => void) | undefined;

  afterEach(() => {
    cleanup?.();
    cleanup = undefined;
    vi.restoreAllMocks();
  });

  it('draws the board before the first move', () => {
    const { lastFrame, unmount } = render(
      <GameScreen game={newGame()} tickMs={5} onFinish={vi.fn()} onCrash={vi.fn()} />
    );
    cleanup = unmount;

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Score: 0');
    expect(frame).toContain('Difficulty: Easy');
    expect(frame).toContain('**@');
  });

  it('repaints the board when the snake moves', async () => {
    const { stdin, lastFrame, unmount } = render(
      <GameScreen game={newGame()} tickMs={5} onFinish={vi.fn()} onCrash={vi.fn()} />
    );
    cleanup = unmount;
    const snakeRow = () => (lastFrame() ?? '').split('\n')[5];
    expect(snakeRow().indexOf('**@')).toBe(8);

    await delay(60);
    stdin.write('\u001B[C');

    await vi.waitFor(() => expect(snakeRow().indexOf('**@')).toBe(9));
  });

  it('finishes with a quit state when q is pressed', async () => {
    const onFinish = vi.fn();
    const { stdin, unmount } = render(
      <GameScreen game={newGame()} tickMs={5} onFinish={onFinish} onCrash={vi.fn()} />
    );
    cleanup = unmount;

    await delay(50);
    stdin.write('q');

    await vi.waitFor(() => expect(onFinish).toHaveBeenCalledTimes(1));
    expect(onFinish.mock.calls[0][0]).toMatchObject({ status: 'quit', score: 0 });
  });

  it('hands a failing tick to onCrash with a snapshot', async () => {
    const game = newGame();
    vi.spyOn(game, 'tick').mockImplementation(() => {
      throw new Error('boom');
    });
    const onCrash = vi.fn();
    const { unmount } = render(
      <GameScreen game={game} tickMs={5} onFinish={vi.fn()} onCrash={onCrash} />
    );
    cleanup = unmount;

    await vi.waitFor(() => expect(onCrash).toHaveBeenCalledTimes(1));
    const error: unknown = onCrash.mock.calls[0][0];
    expect(error).toBeInstanceOf(GameCrashError);
    if (error instanceof GameCrashError) {
      expect(error.message).toBe('Game crashed: boom');
      expect(error.snapshot.head).toEqual({ row: 5, col: 10 });
    }
  });
});
