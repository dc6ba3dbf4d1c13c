/**
 * Grid geometry: positions, directions, bounds and wrap-around addressing
 */

import { ContractViolationError } from './errors.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Position {
  x: number;
  y: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface Dimensions {
  width: number;
  height: number;
  wrapped: boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

// y grows upward, matching the Battlesnake API
export const DIRECTION_OFFSETS: Record<Direction, Position> = {
  up:    { x:  0, y:  1 },
  down:  { x:  0, y: -1 },
  left:  { x: -1, y:  0 },
  right: { x:  1, y:  0 },
};

export const ALL_DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && ALL_DIRECTIONS.some(dir => dir === value);
}

/**
 * Parse a direction name, accepting the single-letter forms u/d/l/r
 */
export function parseDirection(raw: string): Direction {
  const value = raw.trim().toLowerCase();
  const short: Record<string, Direction> = { u: 'up', d: 'down', l: 'left', r: 'right' };
  const resolved = short[value] ?? value;
  if (!isDirection(resolved)) {
    throw new ContractViolationError('invalid-direction', `Unknown direction: ${raw}`);
  }
  return resolved;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Check if coordinates are within the board rectangle, ignoring wrap
 */
export function isInBounds(pos: Position, dims: Dimensions): boolean {
  return pos.x >= 0 && pos.x < dims.width && pos.y >= 0 && pos.y < dims.height;
}

/**
 * Check if a position is addressable. Every integer position is valid on a
 * wrapping board.
 */
export function isValid(pos: Position, dims: Dimensions): boolean {
  if (!Number.isInteger(pos.x) || !Number.isInteger(pos.y)) return false;
  return dims.wrapped || isInBounds(pos, dims);
}

function mod(value: number, size: number): number {
  return ((value % size) + size) % size;
}

/**
 * Bring a position onto the board when the board wraps. Identity otherwise.
 */
export function normalize(pos: Position, dims: Dimensions): Position {
  if (!dims.wrapped) return pos;
  return { x: mod(pos.x, dims.width), y: mod(pos.y, dims.height) };
}

/**
 * The adjacent position in a direction. May be off the board when the board
 * does not wrap.
 */
export function neighbor(pos: Position, direction: Direction, dims: Dimensions): Position {
  const offset = DIRECTION_OFFSETS[direction];
  return normalize({ x: pos.x + offset.x, y: pos.y + offset.y }, dims);
}

/**
 * The direction that moves `from` onto `to` in one step, or null when the two
 * cells are not adjacent.
 */
export function directionBetween(from: Position, to: Position, dims: Dimensions): Direction | null {
  for (const dir of ALL_DIRECTIONS) {
    const next = neighbor(from, dir, dims);
    if (samePosition(next, to)) return dir;
  }
  return null;
}

/**
 * Row-major cell index of a position. Throws for positions a bounded board
 * cannot address.
 */
export function toIndex(pos: Position, dims: Dimensions): number {
  if (!isValid(pos, dims)) {
    throw new ContractViolationError(
      'invalid-position',
      `Position (${pos.x}, ${pos.y}) is outside the ${dims.width}x${dims.height} board`,
    );
  }
  const p = normalize(pos, dims);
  return p.y * dims.width + p.x;
}

export function fromIndex(index: number, width: number): Position {
  return { x: index % width, y: Math.floor(index / width) };
}
