import { describe, expect, it } from 'vitest';
import { shouldMove } from './timing';

describe('shouldMove', () => {
  it('moves once the interval has elapsed', () => {
    expect(shouldMove(1600, 1000, 600, false)).toBe(true);
    expect(shouldMove(1700, 1000, 600, false)).toBe(true);
  });

  it('waits before the interval without a forced move', () => {
    expect(shouldMove(1599, 1000, 600, false)).toBe(false);
  });

  it('allows forced moves 50ms apart', () => {
    expect(shouldMove(1050, 1000, 600, true)).toBe(true);
    expect(shouldMove(1049, 1000, 600, true)).toBe(false);
  });

  it('caps forced moves even on the fastest interval', () => {
    expect(shouldMove(1030, 1000, 50, true)).toBe(false);
    expect(shouldMove(1050, 1000, 50, false)).toBe(true);
  });
});
