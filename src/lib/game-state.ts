/**
 * Game-state aggregate: board, agents, turn and variant policy
 *
 * States are frozen snapshots. The simulator derives new ones and never
 * touches the ones it was given, so callers can keep any number of them
 * around while searching.
 */

import { freezeAgent, isLiving } from './agent.js';
import type { Agent, AgentInit } from './agent.js';
import { Board } from './board.js';
import { ContractViolationError } from './errors.js';
import { isValid, normalize } from './geometry.js';
import type { Dimensions, Position } from './geometry.js';
import { createRuleset, teamOf } from './rulesets.js';
import type { Ruleset } from './rulesets.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface GameState {
  readonly id: string;
  readonly turn: number;
  readonly board: Board;
  /** Insertion order is processing order */
  readonly agents: readonly Agent[];
  readonly rules: Ruleset;
  /** The agent the caller plays, when there is one */
  readonly you: string | null;
  readonly terminal: boolean;
  readonly winnerId: string | null;
}

export interface GameStateInit {
  id?: string;
  turn?: number;
  width: number;
  height: number;
  rules?: Ruleset;
  agents: readonly AgentInit[];
  food?: readonly Position[];
  hazards?: readonly Position[];
  you?: string | null;
}

export interface TerminalStatus {
  terminal: boolean;
  winnerId: string | null;
}

// ---------------------------------------------------------------------------
// Terminal evaluation
// ---------------------------------------------------------------------------

/**
 * Decide whether a list of agents has finished its game.
 *
 * A solo game ends when its only agent is gone. Otherwise the game ends once
 * at most one side has a living member, and the first living member of that
 * side is the winner.
 */
export function evaluateTerminal(agents: readonly Agent[], rules: Ruleset): TerminalStatus {
  const alive = agents.filter(isLiving);

  if (agents.length === 1) {
    return alive.length === 0
      ? { terminal: true, winnerId: null }
      : { terminal: false, winnerId: null };
  }

  const sides = new Set(alive.map(agent => teamOf(rules, agent)));
  if (sides.size > 1) return { terminal: false, winnerId: null };
  return { terminal: true, winnerId: alive[0]?.id ?? null };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function checkPosition(pos: Position, dims: Dimensions, what: string): Position {
  if (!isValid(pos, dims)) {
    throw new ContractViolationError(
      'invalid-position',
      `${what} at (${pos.x}, ${pos.y}) is outside the ${dims.width}x${dims.height} board`,
    );
  }
  return normalize(pos, dims);
}

function buildAgent(init: AgentInit, rules: Ruleset, dims: Dimensions): Agent {
  if (init.body.length === 0) {
    throw new ContractViolationError('empty-body', `Agent ${init.id} has an empty body`);
  }
  const health = init.health ?? rules.startingHealth;
  const eliminated = init.eliminated ?? null;
  if (!Number.isFinite(health) || health > rules.maxHealth || health < 0 || (eliminated === null && health === 0)) {
    throw new ContractViolationError(
      'invalid-health',
      `Agent ${init.id} has health ${health}, expected 1..${rules.maxHealth} while alive`,
    );
  }

  return freezeAgent({
    id: init.id,
    name: init.name ?? init.id,
    body: init.body.map(seg => checkPosition(seg, dims, `Agent ${init.id} segment`)),
    health,
    team: init.team ?? null,
    eliminated,
  });
}

/**
 * Build a state from plain descriptors. Every agent starts at the ruleset's
 * starting health unless told otherwise.
 */
export function createGameState(init: GameStateInit): GameState {
  const rules = init.rules ?? createRuleset('standard');
  const dims: Dimensions = { width: init.width, height: init.height, wrapped: rules.wrapped };

  const seen = new Set<string>();
  for (const agent of init.agents) {
    if (seen.has(agent.id)) {
      throw new ContractViolationError('duplicate-agent', `Duplicate agent id: ${agent.id}`);
    }
    seen.add(agent.id);
  }

  // Board.create checks the dimensions before any position is looked at
  const empty = Board.create(dims);
  const agents = init.agents.map(agent => buildAgent(agent, rules, dims));
  const board = Board.create(empty.dimensions, {
    food: (init.food ?? []).map(pos => checkPosition(pos, dims, 'Food')),
    hazards: (init.hazards ?? []).map(pos => checkPosition(pos, dims, 'Hazard')),
    bodies: agents.filter(isLiving).map(agent => agent.body),
  });

  const you = init.you ?? null;
  if (you !== null && !seen.has(you)) {
    throw new ContractViolationError('unknown-agent', `Unknown agent id for you: ${you}`);
  }

  return freezeState({
    id: init.id ?? '',
    turn: init.turn ?? 0,
    board,
    agents,
    rules,
    you,
    ...evaluateTerminal(agents, rules),
  });
}

export function freezeState(state: GameState): GameState {
  return Object.freeze({ ...state, agents: Object.freeze([...state.agents]) });
}

// ---------------------------------------------------------------------------
// Access
// ---------------------------------------------------------------------------

/**
 * Living agents in insertion order. The returned iterable is lazy and can be
 * iterated any number of times.
 */
export function aliveAgents(state: GameState): Iterable<Agent> {
  return {
    *[Symbol.iterator]() {
      for (const agent of state.agents) {
        if (isLiving(agent)) yield agent;
      }
    },
  };
}

export function findAgent(state: GameState, id: string): Agent | undefined {
  return state.agents.find(agent => agent.id === id);
}

export function getAgent(state: GameState, id: string): Agent {
  const agent = findAgent(state, id);
  if (!agent) {
    throw new ContractViolationError('unknown-agent', `Unknown agent id: ${id}`);
  }
  return agent;
}
