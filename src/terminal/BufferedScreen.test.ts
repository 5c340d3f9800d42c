import { describe, expect, it } from 'vitest';
import { BufferedScreen } from './BufferedScreen';

describe('BufferedScreen', () => {
  it('starts blank', () => {
    expect(new BufferedScreen(2, 3).lines()).toEqual(['   ', '   ']);
  });

  it('draws cells and clips anything off screen', () => {
    const screen = new BufferedScreen(2, 3);
    screen.drawCell({ row: 0, col: 1 }, '@');
    screen.drawCell({ row: 5, col: 1 }, 'x');
    screen.drawCell({ row: 1, col: -1 }, 'x');
    screen.drawCell({ row: 1, col: 3 }, 'x');

    expect(screen.lines()).toEqual([' @ ', '   ']);
  });

  it('clips text at the right edge', () => {
    const screen = new BufferedScreen(1, 5);
    screen.drawText({ row: 0, col: 2 }, 'Score');
    expect(screen.lines()).toEqual(['  Sco']);
  });

  it('clears back to blank', () => {
    const screen = new BufferedScreen(1, 2);
    screen.drawText({ row: 0, col: 0 }, 'ab');
    screen.clear();
    expect(screen.lines()).toEqual(['  ']);
  });

  it('keeps only the latest unpolled key', () => {
    const screen = new BufferedScreen(1, 1);
    screen.pushKey({ type: 'direction', direction: 'up' });
    screen.pushKey({ type: 'direction', direction: 'left' });

    expect(screen.pollKey()).toEqual({ type: 'direction', direction: 'left' });
    expect(screen.pollKey()).toBeUndefined();
  });
});
