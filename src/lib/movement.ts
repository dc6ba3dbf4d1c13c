/**
 * Single-agent movement step
 *
 * Moves one agent one cell and applies food, hazard damage and the growth
 * policy. Shared by the engine, which steps every agent at once, and by the
 * lethal-move queries, which step one agent against a frozen board.
 */

import { headOf } from './agent.js';
import type { Agent, EliminationCause } from './agent.js';
import { isInBounds, neighbor, samePosition } from './geometry.js';
import type { Dimensions, Direction, Position } from './geometry.js';
import { hazardsOn } from './rulesets.js';
import type { Ruleset } from './rulesets.js';
import type { GameState } from './game-state.js';

export interface CellLookup {
  hasFood(pos: Position): boolean;
  hasHazard(pos: Position): boolean;
}

export interface AgentStep {
  agent: Agent;
  direction: Direction;
  head: Position;
  /** Head left a bounded board */
  offBoard: boolean;
  /** Post-move body, head first */
  body: Position[];
  ate: boolean;
  health: number;
}

/**
 * Move an agent. An off-board head never eats and takes no hazard damage.
 */
export function stepAgent(
  agent: Agent,
  direction: Direction,
  rules: Ruleset,
  dims: Dimensions,
  cells: CellLookup,
): AgentStep {
  const head = neighbor(headOf(agent), direction, dims);
  const offBoard = !dims.wrapped && !isInBounds(head, dims);
  const ate = !offBoard && cells.hasFood(head);
  const constrictor = rules.growth === 'constrictor';

  const keepTail = ate || constrictor;
  const body = [head, ...(keepTail ? agent.body : agent.body.slice(0, -1))];

  let health: number;
  if (ate || constrictor) {
    health = rules.maxHealth;
  } else {
    const hazard = !offBoard && cells.hasHazard(head);
    health = agent.health - 1 - (hazard ? rules.hazardDamage : 0);
  }

  return { agent, direction, head, offBoard, body, ate, health };
}

/**
 * Causes an agent can bring on itself: wall, own body, starvation. Rivals are
 * not looked at.
 */
export function selfInflictedCause(step: AgentStep): EliminationCause | null {
  if (step.health <= 0) return 'starved';
  if (step.offBoard) return 'collided-wall';
  if (hitsOwnBody(step)) return 'collided-self';
  return null;
}

export function hitsOwnBody(step: AgentStep): boolean {
  for (let i = 1; i < step.body.length; i++) {
    if (samePosition(step.body[i], step.head)) return true;
  }
  return false;
}

/**
 * Food and hazard lookups as the next turn will see them: the hazard layer
 * comes from the ruleset's schedule when it has cells for that turn.
 */
export function upcomingCells(state: GameState): CellLookup {
  const { board } = state;
  const scheduled = hazardsOn(state.rules, state.turn + 1, board.dimensions);
  if (scheduled === null) return board;

  const keys = new Set(scheduled.map(pos => `${pos.x},${pos.y}`));
  return {
    hasFood: pos => board.hasFood(pos),
    hasHazard: pos => keys.has(`${pos.x},${pos.y}`),
  };
}
