import { describe, it, expect } from 'vitest';
import { ContractViolationError } from './errors.js';
import {
  directionBetween,
  fromIndex,
  isValid,
  neighbor,
  normalize,
  parseDirection,
  toIndex,
} from './geometry.js';

const bounded = { width: 11, height: 11, wrapped: false };
const wrapped = { width: 7, height: 5, wrapped: true };

describe('geometry', () => {
  it('moves up by increasing y', () => {
    expect(neighbor({ x: 3, y: 3 }, 'up', bounded)).toEqual({ x: 3, y: 4 });
    expect(neighbor({ x: 3, y: 3 }, 'down', bounded)).toEqual({ x: 3, y: 2 });
    expect(neighbor({ x: 3, y: 3 }, 'left', bounded)).toEqual({ x: 2, y: 3 });
    expect(neighbor({ x: 3, y: 3 }, 'right', bounded)).toEqual({ x: 4, y: 3 });
  });

  it('leaves the board on a bounded edge', () => {
    const next = neighbor({ x: 10, y: 5 }, 'right', bounded);
    expect(next).toEqual({ x: 11, y: 5 });
    expect(isValid(next, bounded)).toBe(false);
  });

  it('wraps across both axes', () => {
    expect(neighbor({ x: 6, y: 2 }, 'right', wrapped)).toEqual({ x: 0, y: 2 });
    expect(neighbor({ x: 0, y: 0 }, 'down', wrapped)).toEqual({ x: 0, y: 4 });
    expect(normalize({ x: -8, y: 11 }, wrapped)).toEqual({ x: 6, y: 1 });
    expect(isValid({ x: -100, y: 100 }, wrapped)).toBe(true);
  });

  it('rejects non-integer positions even when wrapped', () => {
    expect(isValid({ x: 1.5, y: 0 }, wrapped)).toBe(false);
  });

  it('finds the direction between adjacent cells, across the seam too', () => {
    expect(directionBetween({ x: 2, y: 2 }, { x: 2, y: 3 }, bounded)).toBe('up');
    expect(directionBetween({ x: 6, y: 1 }, { x: 0, y: 1 }, wrapped)).toBe('right');
    expect(directionBetween({ x: 0, y: 0 }, { x: 2, y: 0 }, bounded)).toBeNull();
  });

  it('indexes rows from the bottom', () => {
    expect(toIndex({ x: 2, y: 1 }, bounded)).toBe(13);
    expect(fromIndex(13, 11)).toEqual({ x: 2, y: 1 });
    expect(toIndex({ x: 7, y: -1 }, wrapped)).toBe(4 * 7 + 0);
  });

  it('refuses to index off a bounded board', () => {
    expect(() => toIndex({ x: 11, y: 0 }, bounded)).toThrow(ContractViolationError);
    expect(() => toIndex({ x: 11, y: 0 }, bounded)).toThrow('Position (11, 0) is outside the 11x11 board');
  });

  it('parses direction names and their initials', () => {
    expect(parseDirection(' Up ')).toBe('up');
    expect(parseDirection('l')).toBe('left');
    expect(() => parseDirection('north')).toThrow('Unknown direction: north');
  });
});
