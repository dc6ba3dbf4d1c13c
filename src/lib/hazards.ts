/**
 * Hazard schedules
 *
 * A schedule maps a turn to the hazard cells in force on that turn. Returning
 * null leaves the board's current hazards untouched, which is what a static
 * map wants and what the moving schedules do between their spawn turns.
 */

import { DIRECTION_OFFSETS, isInBounds } from './geometry.js';
import type { Dimensions, Direction, Position } from './geometry.js';
import { createRNG, hashSeed, randomInt } from './rng.js';

export interface HazardSchedule {
  readonly kind: 'static' | 'royale' | 'spiral';
  hazardsOn(turn: number, dims: Dimensions): readonly Position[] | null;
}

export const STATIC_HAZARDS: HazardSchedule = Object.freeze({
  kind: 'static' as const,
  hazardsOn: () => null,
});

// ---------------------------------------------------------------------------
// Royale: the safe area shrinks by one row or column every N turns
// ---------------------------------------------------------------------------

export interface RoyaleOptions {
  everyNTurns: number;
  seed: number;
}

export interface SafeArea {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * The rectangle still free of hazard on a turn. Each shrink step draws the
 * side to move in from an RNG seeded only by the game seed, so every turn
 * replays the same sequence of sides.
 */
export function royaleSafeArea(turn: number, dims: Dimensions, options: RoyaleOptions): SafeArea {
  const area: SafeArea = { minX: 0, maxX: dims.width - 1, minY: 0, maxY: dims.height - 1 };
  const shrinks = Math.floor(turn / options.everyNTurns);
  const { rng } = createRNG(hashSeed(options.seed));

  for (let i = 0; i < shrinks; i++) {
    switch (randomInt(rng, 4)) {
      case 0: area.minX++; break;
      case 1: area.maxX--; break;
      case 2: area.minY++; break;
      default: area.maxY--; break;
    }
  }
  return area;
}

export function royaleShrink(options: RoyaleOptions): HazardSchedule {
  const settings = Object.freeze({ ...options });
  return Object.freeze({
    kind: 'royale' as const,
    hazardsOn(turn: number, dims: Dimensions): readonly Position[] | null {
      if (turn < settings.everyNTurns || turn % settings.everyNTurns !== 0) return null;
      const area = royaleSafeArea(turn, dims, settings);
      const cells: Position[] = [];
      for (let y = 0; y < dims.height; y++) {
        for (let x = 0; x < dims.width; x++) {
          const safe = x >= area.minX && x <= area.maxX && y >= area.minY && y <= area.maxY;
          if (!safe) cells.push({ x, y });
        }
      }
      return cells;
    },
  });
}

// ---------------------------------------------------------------------------
// Spiral: one cell every N turns, walking out clockwise from a center
// ---------------------------------------------------------------------------

export interface SpiralOptions {
  center: Position;
  /** Turn on which the center cell first appears */
  startTurn: number;
  everyNTurns: number;
}

// The spiral closes odd squares: 1, then 3x3, then 5x5 and so on
export function nextPerfectOddSquare(n: number): number {
  let base = Math.floor(Math.sqrt(n)) + 1;
  if (base % 2 === 0) base++;
  return base * base;
}

export function isPerfectOddSquare(n: number): boolean {
  const root = Math.floor(Math.sqrt(n));
  return root * root === n && root % 2 === 1;
}

/**
 * Every spiral cell spawned up to and including `turn`, center first.
 * Cells are not clipped to any board.
 */
export function spiralHazardCells(options: SpiralOptions, turn: number): Position[] {
  if (turn < options.startTurn) return [];

  const { center, startTurn, everyNTurns } = options;
  const cells: Position[] = [{ ...center }];
  let next: Position = { x: center.x, y: center.y + 1 };
  let direction: Direction = 'right';

  for (let t = startTurn + 1; t <= turn; t++) {
    if (t % everyNTurns !== 0) continue;

    // plus one for the center cell
    const spawns = Math.floor((t - startTurn) / everyNTurns) + 1;
    const radius = Math.floor(Math.sqrt(nextPerfectOddSquare(spawns)) / 2);
    cells.push(next);

    const offset = DIRECTION_OFFSETS[direction];
    next = { x: next.x + offset.x, y: next.y + offset.y };
    const dx = next.x - center.x;
    const dy = next.y - center.y;

    if (dx === radius && dy === radius) direction = 'down';
    else if (dx === radius && dy === -radius) direction = 'left';
    else if (dx === -radius && dy === -radius) direction = 'up';
    else if (dx === -radius && dy === radius) direction = 'up';
    if (isPerfectOddSquare(spawns)) direction = 'right';
  }

  return cells;
}

export function spiralHazards(options: SpiralOptions): HazardSchedule {
  const settings = Object.freeze({ ...options, center: Object.freeze({ ...options.center }) });
  return Object.freeze({
    kind: 'spiral' as const,
    hazardsOn(turn: number, dims: Dimensions): readonly Position[] | null {
      if (turn < settings.startTurn) return null;
      const spawnTurn = turn === settings.startTurn || turn % settings.everyNTurns === 0;
      if (!spawnTurn) return null;
      return spiralHazardCells(settings, turn).filter(cell => isInBounds(cell, dims));
    },
  });
}
