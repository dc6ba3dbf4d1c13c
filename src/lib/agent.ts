/**
 * Agent (snake) descriptor
 */

import { ContractViolationError } from './errors.js';
import type { Position } from './geometry.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type EliminationCause =
  | 'starved'
  | 'collided-self'
  | 'collided-other'
  | 'collided-wall'
  | 'eliminated-by-opponent'
  | 'squad-eliminated';

export type EliminationStatus = EliminationCause | 'none';

export interface Elimination {
  cause: EliminationCause;
  turn: number;
  /** Id of the agent whose body or head caused the elimination */
  by: string | null;
}

export interface Agent {
  readonly id: string;
  readonly name: string;
  /** Head first. Repeated positions are stacked segments. */
  readonly body: readonly Position[];
  readonly health: number;
  readonly team: string | null;
  readonly eliminated: Elimination | null;
}

export interface AgentInit {
  id: string;
  name?: string;
  body: readonly Position[];
  health?: number;
  team?: string | null;
  eliminated?: Elimination | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Freeze an agent and its body. Agents are shared between states, so nothing
 * may change them once built.
 */
export function freezeAgent(agent: Agent): Agent {
  const body = Object.freeze(agent.body.map(seg => Object.freeze({ x: seg.x, y: seg.y })));
  const eliminated = agent.eliminated ? Object.freeze({ ...agent.eliminated }) : null;
  return Object.freeze({ ...agent, body, eliminated });
}

export function isLiving(agent: Agent): boolean {
  return agent.eliminated === null;
}

export function eliminationStatus(agent: Agent): EliminationStatus {
  return agent.eliminated?.cause ?? 'none';
}

export function headOf(agent: Agent): Position {
  const head = agent.body[0];
  if (!head) {
    throw new ContractViolationError('empty-body', `Agent ${agent.id} has no body`);
  }
  return head;
}

/** The segment right behind the head, if the snake has one off the head cell */
export function neckOf(agent: Agent): Position | null {
  const head = headOf(agent);
  for (let i = 1; i < agent.body.length; i++) {
    const seg = agent.body[i];
    if (seg.x !== head.x || seg.y !== head.y) return seg;
  }
  return null;
}

export function tailOf(agent: Agent): Position {
  const tail = agent.body[agent.body.length - 1];
  if (!tail) {
    throw new ContractViolationError('empty-body', `Agent ${agent.id} has no body`);
  }
  return tail;
}
