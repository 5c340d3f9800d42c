import { describe, expect, it } from 'vitest';
import { OPPOSITE, resolveInput } from './input';
import { type Direction } from './types';

const DIRECTIONS: Direction[] = ['up', 'down', 'left', 'right'];

describe('resolveInput', () => {
  it('ignores a reversal without signalling', () => {
    DIRECTIONS.forEach((current) => {
      expect(resolveInput(current, { type: 'direction', direction: OPPOSITE[current] })).toEqual({
        direction: current,
        signal: null,
      });
    });
  });

  it('forces a move when the current direction is pressed again', () => {
    DIRECTIONS.forEach((current) => {
      expect(resolveInput(current, { type: 'direction', direction: current })).toEqual({
        direction: current,
        signal: 'forceMove',
      });
    });
  });

  it('turns and forces a move on a perpendicular key', () => {
    expect(resolveInput('right', { type: 'direction', direction: 'up' })).toEqual({
      direction: 'up',
      signal: 'forceMove',
    });
    expect(resolveInput('up', { type: 'direction', direction: 'left' })).toEqual({
      direction: 'left',
      signal: 'forceMove',
    });
  });

  it('signals quit regardless of heading', () => {
    expect(resolveInput('left', { type: 'quit' })).toEqual({ direction: 'left', signal: 'quit' });
  });

  it('does nothing without a key or with a non-game key', () => {
    expect(resolveInput('down', undefined)).toEqual({ direction: 'down', signal: null });
    expect(resolveInput('down', { type: 'char', value: 'x' })).toEqual({
      direction: 'down',
      signal: null,
    });
    expect(resolveInput('down', { type: 'confirm' })).toEqual({ direction: 'down', signal: null });
  });
});
