/**
 * Read-only queries over a game state
 *
 * Nothing here advances the turn. Search code calls these to judge states and
 * candidate moves without paying for a full simulation.
 */

import { headOf, isLiving, neckOf } from './agent.js';
import type { Agent, EliminationCause } from './agent.js';
import { findAgent, getAgent } from './game-state.js';
import type { GameState } from './game-state.js';
import { ALL_DIRECTIONS, isValid, neighbor, samePosition } from './geometry.js';
import type { Direction, Position } from './geometry.js';
import { selfInflictedCause, stepAgent, upcomingCells } from './movement.js';
import { isCollisionExempt } from './rulesets.js';

export type Outcome = 'ongoing' | 'won' | 'draw' | 'lost';

// ---------------------------------------------------------------------------
// Game status
// ---------------------------------------------------------------------------

export function isTerminal(state: GameState): boolean {
  return state.terminal;
}

/** Id of the winning agent, or null while ongoing and on a draw or loss */
export function winner(state: GameState): string | null {
  return state.winnerId;
}

/** Team of the winning agent, when it plays for one */
export function winningTeam(state: GameState): string | null {
  if (state.winnerId === null) return null;
  return getAgent(state, state.winnerId).team;
}

/** A game that starts with no agents is over at once and counts as won */
export function outcome(state: GameState): Outcome {
  if (!state.terminal) return 'ongoing';
  if (state.winnerId !== null || state.agents.length === 0) return 'won';
  return state.agents.length === 1 ? 'lost' : 'draw';
}

/** True once the game is over or the agent is out of it */
export function isTerminalFor(state: GameState, id: string): boolean {
  return state.terminal || !isLiving(getAgent(state, id));
}

// ---------------------------------------------------------------------------
// Agent reads
// ---------------------------------------------------------------------------

export function isAlive(state: GameState, id: string): boolean {
  const agent = findAgent(state, id);
  return agent !== undefined && isLiving(agent);
}

export function aliveCount(state: GameState): number {
  return state.agents.filter(isLiving).length;
}

export function agentHealth(state: GameState, id: string): number {
  return getAgent(state, id).health;
}

export function agentLength(state: GameState, id: string): number {
  return getAgent(state, id).body.length;
}

export function agentHead(state: GameState, id: string): Position {
  return headOf(getAgent(state, id));
}

export function isNeck(state: GameState, id: string, pos: Position): boolean {
  const neck = neckOf(getAgent(state, id));
  return neck !== null && samePosition(neck, pos);
}

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

/** Adjacent cells that exist on the board, in direction order */
export function neighbors(state: GameState, pos: Position): Position[] {
  const dims = state.board.dimensions;
  return ALL_DIRECTIONS
    .map(dir => neighbor(pos, dir, dims))
    .filter(next => isValid(next, dims));
}

/** Adjacent cells free of any living body */
export function possibleMoves(state: GameState, pos: Position): Position[] {
  return neighbors(state, pos).filter(next => !state.board.hasBody(next));
}

// ---------------------------------------------------------------------------
// Move lookahead
// ---------------------------------------------------------------------------

function rivalCause(state: GameState, mover: Agent, head: Position): { cause: EliminationCause; by: string } | null {
  for (const rival of state.agents) {
    if (rival.id === mover.id || !isLiving(rival)) continue;
    if (isCollisionExempt(state.rules, mover, rival)) continue;
    if (rival.body.some(seg => samePosition(seg, head))) {
      return { cause: 'collided-other', by: rival.id };
    }
  }
  return null;
}

/**
 * What would kill the agent if it made this move while every other agent
 * stayed where it is. Null for a safe move, and for an agent that is already
 * out of the game.
 */
export function lethalCause(state: GameState, id: string, direction: Direction): EliminationCause | null {
  const agent = getAgent(state, id);
  if (!isLiving(agent)) return null;

  const step = stepAgent(agent, direction, state.rules, state.board.dimensions, upcomingCells(state));
  return selfInflictedCause(step) ?? rivalCause(state, agent, step.head)?.cause ?? null;
}

export function isLethalMove(state: GameState, id: string, direction: Direction): boolean {
  return lethalCause(state, id, direction) !== null;
}

/**
 * Directions that do not kill the agent on its own. Rivals are ignored.
 */
export function validDirections(state: GameState, id: string): Direction[] {
  const agent = getAgent(state, id);
  if (!isLiving(agent)) return [];
  const cells = upcomingCells(state);
  const dims = state.board.dimensions;
  return ALL_DIRECTIONS.filter(dir =>
    selfInflictedCause(stepAgent(agent, dir, state.rules, dims, cells)) === null,
  );
}
