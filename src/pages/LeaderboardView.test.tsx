import { render } from 'ink-testing-library';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatScoreRow } from '../components/ScoreTable';
import { addHighScore, emptyLeaderboard } from '../leaderboard/leaderboard';
import LeaderboardView, { cycleDifficulty } from './LeaderboardView';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('cycleDifficulty', () => {
  it('wraps around both ends', () => {
    expect(cycleDifficulty('easy', 1)).toBe('medium');
    expect(cycleDifficulty('insane', 1)).toBe('easy');
    expect(cycleDifficulty('easy', -1)).toBe('insane');
  });
});

describe('formatScoreRow', () => {
  it('aligns rank, name and score', () => {
    expect(formatScoreRow({ name: 'AB1', score: 50 }, 0)).toBe(` 1. AB1${' '.repeat(17)}     50`);
  });
});

describe('LeaderboardView', () => {
  let cleanup: (() => void) | undefined;

  afterEach(() => {
    cleanup?.();
    cleanup = undefined;
  });

  it('lists the entries of one tier', () => {
    const board = addHighScore('CD2', 80, 'hard', addHighScore('AB1', 50, 'hard', emptyLeaderboard()));
    const { lastFrame, unmount } = render(
      <LeaderboardView difficulty="hard" leaderboard={board} onChangeDifficulty={vi.fn()} onBack={vi.fn()} />
    );
    cleanup = unmount;

    const frame = lastFrame() ?? '';
    expect(frame).toContain('HIGH SCORES - HARD');
    expect(frame).toContain(formatScoreRow({ name: 'CD2', score: 80 }, 0));
    expect(frame).toContain(formatScoreRow({ name: 'AB1', score: 50 }, 1));
    expect(frame.indexOf('CD2')).toBeLessThan(frame.indexOf('AB1'));
  });

  it('says so when a tier is empty', () => {
    const { lastFrame, unmount } = render(
      <LeaderboardView
        difficulty="easy"
        leaderboard={emptyLeaderboard()}
        onChangeDifficulty={vi.fn()}
        onBack={vi.fn()}
      />
    );
    cleanup = unmount;

    expect(lastFrame()).toContain('No high scores yet');
  });

  it('cycles tiers with the arrow keys and leaves on anything else', async () => {
    const onChangeDifficulty = vi.fn();
    const onBack = vi.fn();
    const { stdin, unmount } = render(
      <LeaderboardView
        difficulty="hard"
        leaderboard={emptyLeaderboard()}
        onChangeDifficulty={onChangeDifficulty}
        onBack={onBack}
      />
    );
    cleanup = unmount;

    await delay(50);
    stdin.write('\u001B[C');
    await vi.waitFor(() => expect(onChangeDifficulty).toHaveBeenCalledWith('insane'));

    stdin.write('x');
    await vi.waitFor(() => expect(onBack).toHaveBeenCalledTimes(1));
  });
});
