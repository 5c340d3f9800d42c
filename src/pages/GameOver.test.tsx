import { render } from 'ink-testing-library';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createGrid } from '../games/snake/grid';
import { type GameState } from '../games/snake/types';
import GameOver, { gameOverPrompt } from './GameOver';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const result: GameState = {
  status: 'gameOver',
  reason: 'wall',
  difficulty: 'medium',
  grid: createGrid(10, 60),
  snake: [
    { row: 5, col: 59 },
    { row: 5, col: 58 },
    { row: 5, col: 57 },
  ],
  direction: 'right',
  food: { row: 2, col: 3 },
  obstacles: [],
  score: 40,
};

describe('GameOver', () => {
  let cleanup: (() => void) | undefined;

  afterEach(() => {
    cleanup?.();
    cleanup = undefined;
  });

  it('shows the final score and the high score prompt', () => {
    const { lastFrame, unmount } = render(
      <GameOver result={result} highScore={true} onContinue={vi.fn()} />
    );
    cleanup = unmount;

    const frame = lastFrame() ?? '';
    expect(frame).toContain('GAME OVER!');
    expect(frame).toContain('Final Score: 40');
    expect(frame).toContain(gameOverPrompt(true));
  });

  it('continues on any key', async () => {
    const onContinue = vi.fn();
    const { stdin, unmount } = render(
      <GameOver result={result} highScore={false} onContinue={onContinue} />
    );
    cleanup = unmount;

    await delay(50);
    stdin.write('x');
    await vi.waitFor(() => expect(onContinue).toHaveBeenCalledTimes(1));
  });

  it('ignores direction keys still arriving from the last move', async () => {
    const onContinue = vi.fn();
    const { stdin, unmount } = render(
      <GameOver result={result} highScore={false} onContinue={onContinue} />
    );
    cleanup = unmount;

    await delay(50);
    stdin.write('\u001B[C');
    await delay(20);
    stdin.write('d');
    await delay(50);
    expect(onContinue).not.toHaveBeenCalled();

    stdin.write('\r');
    await vi.waitFor(() => expect(onContinue).toHaveBeenCalledTimes(1));
  });
});
