/**
 * Move resolution engine
 *
 * Advances a game state by one turn from the simultaneous moves of every
 * living agent. The input state is never touched; agents that did not change
 * are shared with the new state by reference.
 */

import { freezeAgent, headOf, isLiving, neckOf } from './agent.js';
import type { Agent, EliminationCause } from './agent.js';
import { CELL_BODY, CELL_FOOD, CELL_HAZARD } from './board.js';
import { ContractViolationError } from './errors.js';
import { evaluateTerminal, freezeState, getAgent } from './game-state.js';
import type { GameState } from './game-state.js';
import { ALL_DIRECTIONS, directionBetween, isDirection, samePosition } from './geometry.js';
import type { Direction, Position } from './geometry.js';
import { selfInflictedCause, stepAgent } from './movement.js';
import type { AgentStep } from './movement.js';
import { isLethalMove, validDirections } from './queries.js';
import { randomInt } from './rng.js';
import type { RNG } from './rng.js';
import { hazardsOn, isCollisionExempt, teamOf } from './rulesets.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type MoveSet = ReadonlyMap<string, Direction> | Readonly<Record<string, Direction>>;
export type CandidateSet = ReadonlyMap<string, readonly Direction[]> | Readonly<Record<string, readonly Direction[]>>;

export interface SimulatorInstruments {
  /** Called once per simulate call with the elapsed wall time */
  observeSimulation(ms: number): void;
}

export interface SimulateOptions {
  instruments?: SimulatorInstruments;
}

export interface Branch {
  moves: Readonly<Record<string, Direction>>;
  state: GameState;
}

interface Elimination {
  cause: EliminationCause;
  by: string | null;
}

function isMap<T>(moves: ReadonlyMap<string, T> | Readonly<Record<string, T>>): moves is ReadonlyMap<string, T> {
  return moves instanceof Map;
}

function entriesOf<T>(moves: ReadonlyMap<string, T> | Readonly<Record<string, T>>): [string, T][] {
  return isMap(moves) ? [...moves.entries()] : Object.entries(moves);
}

// ---------------------------------------------------------------------------
// Move contract
// ---------------------------------------------------------------------------

function checkMoves(state: GameState, moves: MoveSet): Map<string, Direction> {
  const given = new Map<string, Direction>();
  for (const [id, direction] of entriesOf(moves)) {
    getAgent(state, id);
    if (!isDirection(direction)) {
      throw new ContractViolationError('invalid-direction', `Invalid direction for ${id}: ${String(direction)}`);
    }
    given.set(id, direction);
  }
  return given;
}

/**
 * Settle the direction of every living agent
 */
function resolveMoves(state: GameState, given: Map<string, Direction>): Map<string, Direction> {
  const resolved = new Map<string, Direction>();
  for (const agent of state.agents) {
    if (!isLiving(agent)) continue;
    const direction = given.get(agent.id);
    if (direction !== undefined) {
      resolved.set(agent.id, direction);
      continue;
    }
    if (!state.rules.allowMissingMoves) {
      throw new ContractViolationError('missing-move', `No move given for agent ${agent.id}`);
    }
    resolved.set(agent.id, continueStraight(state, agent));
  }
  return resolved;
}

function continueStraight(state: GameState, agent: Agent): Direction {
  const neck = neckOf(agent);
  if (neck === null) return state.rules.defaultMove;
  return directionBetween(neck, headOf(agent), state.board.dimensions) ?? state.rules.defaultMove;
}

// ---------------------------------------------------------------------------
// Squad sharing
// ---------------------------------------------------------------------------

function groupByTeam(state: GameState, steps: AgentStep[]): Map<string, AgentStep[]> {
  const teams = new Map<string, AgentStep[]>();
  for (const step of steps) {
    const key = teamOf(state.rules, step.agent);
    const members = teams.get(key);
    if (members) members.push(step);
    else teams.set(key, [step]);
  }
  return teams;
}

function shareTeamAttributes(state: GameState, steps: AgentStep[]): void {
  const squad = state.rules.squad;
  if (!squad || (!squad.sharedHealth && !squad.sharedLength)) return;

  for (const members of groupByTeam(state, steps).values()) {
    if (members.length < 2) continue;
    const health = Math.max(...members.map(m => m.health));
    const length = Math.max(...members.map(m => m.body.length));
    for (const member of members) {
      if (squad.sharedHealth) member.health = health;
      if (squad.sharedLength) {
        const tail = member.body[member.body.length - 1];
        while (member.body.length < length) member.body.push(tail);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Collisions
// ---------------------------------------------------------------------------

function collisionCause(state: GameState, step: AgentStep, obstacles: AgentStep[]): Elimination | null {
  if (step.offBoard) return { cause: 'collided-wall', by: null };

  const self = selfInflictedCause(step);
  if (self === 'collided-self') return { cause: self, by: null };

  for (const other of obstacles) {
    if (other === step || isCollisionExempt(state.rules, step.agent, other.agent)) continue;
    for (let i = 1; i < other.body.length; i++) {
      if (samePosition(other.body[i], step.head)) {
        return { cause: 'collided-other', by: other.agent.id };
      }
    }
  }

  let longest: AgentStep | null = null;
  for (const other of obstacles) {
    if (other === step || isCollisionExempt(state.rules, step.agent, other.agent)) continue;
    if (!samePosition(other.head, step.head)) continue;
    if (longest === null || other.body.length > longest.body.length) longest = other;
  }
  if (longest !== null && longest.body.length >= step.body.length) {
    return { cause: 'collided-other', by: longest.agent.id };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

/**
 * Advance a state by one turn.
 *
 * Phases run in order: hazard footprint, move, consume, starvation,
 * collisions, squad rules, terminal evaluation, publish. Squad members share
 * health and length only once the turn's eliminations are settled. A terminal
 * state only has its turn counter advanced.
 */
export function simulate(state: GameState, moves: MoveSet, options: SimulateOptions = {}): GameState {
  const started = performance.now();
  try {
    return advance(state, moves);
  } finally {
    options.instruments?.observeSimulation(performance.now() - started);
  }
}

function advance(state: GameState, moves: MoveSet): GameState {
  const given = checkMoves(state, moves);
  if (state.terminal) return freezeState({ ...state, turn: state.turn + 1 });

  const directions = resolveMoves(state, given);
  const nextTurn = state.turn + 1;
  const dims = state.board.dimensions;

  // Hazard footprint
  const builder = state.board.toBuilder();
  const scheduled = hazardsOn(state.rules, nextTurn, dims);
  if (scheduled !== null) builder.replace(CELL_HAZARD, scheduled);
  const cells = {
    hasFood: (pos: Position) => builder.has(pos, CELL_FOOD),
    hasHazard: (pos: Position) => builder.has(pos, CELL_HAZARD),
  };

  // Move and consume
  const steps: AgentStep[] = [];
  for (const agent of state.agents) {
    const direction = directions.get(agent.id);
    if (direction === undefined) continue;
    steps.push(stepAgent(agent, direction, state.rules, dims, cells));
  }
  for (const step of steps) {
    if (step.ate) builder.clear(step.head, CELL_FOOD);
  }

  // Starvation, then collisions against whoever is still standing
  const eliminated = new Map<string, Elimination>();
  for (const step of steps) {
    if (step.health <= 0) eliminated.set(step.agent.id, { cause: 'starved', by: null });
  }
  const obstacles = steps.filter(step => !eliminated.has(step.agent.id) && !step.offBoard);
  const collided = new Map<string, Elimination>();
  for (const step of steps) {
    if (eliminated.has(step.agent.id)) continue;
    const hit = collisionCause(state, step, obstacles);
    if (hit) collided.set(step.agent.id, hit);
  }
  for (const [id, hit] of collided) eliminated.set(id, hit);

  if (state.rules.squad?.sharedElimination) {
    for (const members of groupByTeam(state, steps).values()) {
      if (!members.some(m => eliminated.has(m.agent.id))) continue;
      for (const member of members) {
        if (!eliminated.has(member.agent.id)) {
          eliminated.set(member.agent.id, { cause: 'squad-eliminated', by: null });
        }
      }
    }
  }
  shareTeamAttributes(state, steps.filter(step => !eliminated.has(step.agent.id)));

  // Publish
  const stepById = new Map(steps.map(step => [step.agent.id, step]));
  const agents = state.agents.map(agent => {
    const step = stepById.get(agent.id);
    if (!step) return agent;
    const hit = eliminated.get(agent.id);
    return freezeAgent({
      ...agent,
      body: step.body,
      health: Math.max(0, step.health),
      eliminated: hit ? { cause: hit.cause, turn: nextTurn, by: hit.by } : null,
    });
  });

  builder.clearAll(CELL_BODY);
  builder.markBodies(agents.filter(isLiving).map(agent => agent.body));

  return freezeState({
    ...state,
    turn: nextTurn,
    board: builder.build(),
    agents,
    ...evaluateTerminal(agents, state.rules),
  });
}

// ---------------------------------------------------------------------------
// Branch enumeration
// ---------------------------------------------------------------------------

/**
 * Candidate directions that do not kill the agent on its own. When every
 * candidate is fatal the first one is kept, so each agent has a move.
 */
function pruneCandidates(state: GameState, id: string, candidates: readonly Direction[]): Direction[] {
  const safe = new Set(validDirections(state, id));
  const kept = candidates.filter(dir => safe.has(dir));
  if (kept.length > 0) return kept;
  return candidates.length > 0 ? [candidates[0]] : [];
}

/** Straight ahead when that is safe, else the first safe direction */
function fallbackMove(state: GameState, agent: Agent): Direction {
  const straight = continueStraight(state, agent);
  const safe = validDirections(state, agent.id);
  return safe.includes(straight) ? straight : safe[0] ?? straight;
}

/**
 * Lazily simulate every combination of the agents' candidate moves. The first
 * listed agent varies slowest. Eliminated agents take no part. A living agent
 * that is not listed, or whose list is empty, makes its fallback move in
 * every branch.
 */
export function* simulateWithMoves(
  state: GameState,
  candidates: CandidateSet,
  options: SimulateOptions = {},
): Generator<Branch, void, undefined> {
  const lists: [string, Direction[]][] = [];
  for (const [id, dirs] of entriesOf(candidates)) {
    if (!isLiving(getAgent(state, id))) continue;
    const pruned = pruneCandidates(state, id, dirs);
    if (pruned.length > 0) lists.push([id, pruned]);
  }

  const fixed: Record<string, Direction> = {};
  for (const agent of state.agents) {
    if (!isLiving(agent) || lists.some(([id]) => id === agent.id)) continue;
    fixed[agent.id] = fallbackMove(state, agent);
  }

  const picks = new Array<number>(lists.length).fill(0);
  for (;;) {
    const moves: Record<string, Direction> = {};
    lists.forEach(([id, dirs], i) => { moves[id] = dirs[picks[i]]; });
    Object.assign(moves, fixed);
    yield { moves: Object.freeze(moves), state: simulate(state, moves, options) };

    let i = lists.length - 1;
    while (i >= 0) {
      picks[i]++;
      if (picks[i] < lists[i][1].length) break;
      picks[i] = 0;
      i--;
    }
    if (i < 0) return;
  }
}

/**
 * Every branch of all four directions for the listed agents, every living
 * agent by default. Unlisted agents make their fallback move.
 */
export function simulateAll(
  state: GameState,
  ids?: readonly string[],
  options: SimulateOptions = {},
): Generator<Branch, void, undefined> {
  const candidates = new Map<string, readonly Direction[]>();
  const listed = ids ?? state.agents.filter(isLiving).map(agent => agent.id);
  for (const id of listed) candidates.set(id, ALL_DIRECTIONS);
  return simulateWithMoves(state, candidates, options);
}

// ---------------------------------------------------------------------------
// Random playouts
// ---------------------------------------------------------------------------

/** One random move per living agent that is not lethal against the frozen board */
export function randomReasonableMoves(state: GameState, rng: RNG): Record<string, Direction> {
  const moves: Record<string, Direction> = {};
  for (const agent of state.agents) {
    if (!isLiving(agent)) continue;
    const safe = ALL_DIRECTIONS.filter(dir => !isLethalMove(state, agent.id, dir));
    moves[agent.id] = safe.length > 0 ? safe[randomInt(rng, safe.length)] : state.rules.defaultMove;
  }
  return moves;
}

/**
 * Play random reasonable moves until the game ends or `turns` turns pass.
 * Returns the starting state followed by every state produced.
 */
export function playout(state: GameState, turns: number, rng: RNG, options: SimulateOptions = {}): GameState[] {
  const states = [state];
  let current = state;
  for (let t = 0; t < turns && !current.terminal; t++) {
    current = simulate(current, randomReasonableMoves(current, rng), options);
    states.push(current);
  }
  return states;
}
