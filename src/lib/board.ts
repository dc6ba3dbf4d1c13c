/**
 * Compact board storage
 *
 * One byte per cell, one bit per cell class. Boards are immutable once
 * built. A BoardBuilder takes a private copy of the cells, is changed in
 * place, and hands its buffer to the Board it builds.
 */

import { ContractViolationError } from './errors.js';
import { fromIndex, toIndex } from './geometry.js';
import type { Dimensions, Position } from './geometry.js';

// ---------------------------------------------------------------------------
// Cell bits
// ---------------------------------------------------------------------------

export const CELL_BODY = 0b001;
export const CELL_FOOD = 0b010;
export const CELL_HAZARD = 0b100;

export type CellBit = typeof CELL_BODY | typeof CELL_FOOD | typeof CELL_HAZARD;

export interface CellFlags {
  hasBody: boolean;
  hasFood: boolean;
  hasHazard: boolean;
}

export interface BoardLayers {
  food?: readonly Position[];
  hazards?: readonly Position[];
  bodies?: readonly (readonly Position[])[];
}

function checkDimensions(dims: Dimensions): void {
  const ok = Number.isInteger(dims.width) && Number.isInteger(dims.height)
    && dims.width > 0 && dims.height > 0;
  if (!ok) {
    throw new ContractViolationError(
      'invalid-dimensions',
      `Board dimensions must be positive integers, got ${dims.width}x${dims.height}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Board
// ---------------------------------------------------------------------------

export class Board {
  readonly width: number;
  readonly height: number;
  readonly wrapped: boolean;
  private readonly cells: Uint8Array;

  /** @internal use Board.create or BoardBuilder.build */
  constructor(dims: Dimensions, cells: Uint8Array) {
    this.width = dims.width;
    this.height = dims.height;
    this.wrapped = dims.wrapped;
    this.cells = cells;
    Object.freeze(this);
  }

  static create(dims: Dimensions, layers: BoardLayers = {}): Board {
    checkDimensions(dims);
    const builder = new BoardBuilder(dims, new Uint8Array(dims.width * dims.height));
    builder.replace(CELL_FOOD, layers.food ?? []);
    builder.replace(CELL_HAZARD, layers.hazards ?? []);
    builder.markBodies(layers.bodies ?? []);
    return builder.build();
  }

  get dimensions(): Dimensions {
    return { width: this.width, height: this.height, wrapped: this.wrapped };
  }

  get size(): number {
    return this.cells.length;
  }

  flagsAt(pos: Position): number {
    return this.cells[toIndex(pos, this)];
  }

  cellFlags(pos: Position): CellFlags {
    const bits = this.flagsAt(pos);
    return {
      hasBody: (bits & CELL_BODY) !== 0,
      hasFood: (bits & CELL_FOOD) !== 0,
      hasHazard: (bits & CELL_HAZARD) !== 0,
    };
  }

  hasBody(pos: Position): boolean {
    return (this.flagsAt(pos) & CELL_BODY) !== 0;
  }

  hasFood(pos: Position): boolean {
    return (this.flagsAt(pos) & CELL_FOOD) !== 0;
  }

  hasHazard(pos: Position): boolean {
    return (this.flagsAt(pos) & CELL_HAZARD) !== 0;
  }

  foodPositions(): Position[] {
    return this.positionsWhere(bits => (bits & CELL_FOOD) !== 0);
  }

  hazardPositions(): Position[] {
    return this.positionsWhere(bits => (bits & CELL_HAZARD) !== 0);
  }

  /** Cells holding neither body, food nor hazard */
  emptyPositions(): Position[] {
    return this.positionsWhere(bits => bits === 0);
  }

  toBuilder(): BoardBuilder {
    return new BoardBuilder(this.dimensions, this.cells.slice());
  }

  private positionsWhere(test: (bits: number) => boolean): Position[] {
    const out: Position[] = [];
    for (let i = 0; i < this.cells.length; i++) {
      if (test(this.cells[i])) out.push(fromIndex(i, this.width));
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class BoardBuilder {
  readonly dimensions: Dimensions;
  private readonly cells: Uint8Array;
  private built = false;

  constructor(dims: Dimensions, cells: Uint8Array) {
    this.dimensions = dims;
    this.cells = cells;
  }

  has(pos: Position, bit: CellBit): boolean {
    return (this.cells[toIndex(pos, this.dimensions)] & bit) !== 0;
  }

  set(pos: Position, bit: CellBit): void {
    this.ensureOpen();
    this.cells[toIndex(pos, this.dimensions)] |= bit;
  }

  clear(pos: Position, bit: CellBit): void {
    this.ensureOpen();
    this.cells[toIndex(pos, this.dimensions)] &= ~bit;
  }

  clearAll(bit: CellBit): void {
    this.ensureOpen();
    for (let i = 0; i < this.cells.length; i++) {
      this.cells[i] &= ~bit;
    }
  }

  /** Make `positions` the only cells carrying `bit` */
  replace(bit: CellBit, positions: readonly Position[]): void {
    this.clearAll(bit);
    for (const pos of positions) this.set(pos, bit);
  }

  markBodies(bodies: readonly (readonly Position[])[]): void {
    for (const body of bodies) {
      for (const seg of body) this.set(seg, CELL_BODY);
    }
  }

  build(): Board {
    this.ensureOpen();
    this.built = true;
    return new Board(this.dimensions, this.cells);
  }

  private ensureOpen(): void {
    if (this.built) throw new Error('BoardBuilder was already built');
  }
}

/**
 * Cell flags at a position, for callers that prefer a function to a method
 */
export function cellFlags(board: Board, pos: Position): CellFlags {
  return board.cellFlags(pos);
}
