/**
 * Rulesets: the variant policies the move resolution engine consults
 *
 * A ruleset is a frozen value. The engine reads its fields and calls the
 * query functions below. It never looks at a ruleset's name, so a new variant
 * is a new preset here and nothing else.
 */

import type { Agent } from './agent.js';
import { ContractViolationError } from './errors.js';
import type { Dimensions, Direction, Position } from './geometry.js';
import { STATIC_HAZARDS, royaleShrink } from './hazards.js';
import type { HazardSchedule } from './hazards.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type RulesetName =
  | 'standard'
  | 'solo'
  | 'wrapped'
  | 'constrictor'
  | 'wrapped-constrictor'
  | 'royale'
  | 'squad';

/** 'constrictor' keeps the tail every turn and never lets health drop */
export type GrowthPolicy = 'normal' | 'constrictor';

export interface SquadRules {
  /** Teammates may pass through each other's bodies and heads */
  allowBodyCollisions: boolean;
  /** A team is eliminated together */
  sharedElimination: boolean;
  sharedHealth: boolean;
  sharedLength: boolean;
}

export interface Ruleset {
  readonly name: string;
  readonly wrapped: boolean;
  readonly startingHealth: number;
  readonly maxHealth: number;
  readonly hazardDamage: number;
  readonly hazards: HazardSchedule;
  readonly growth: GrowthPolicy;
  readonly squad: Readonly<SquadRules> | null;
  /** When set, a living agent without a move continues straight */
  readonly allowMissingMoves: boolean;
  readonly defaultMove: Direction;
}

export interface RulesetOverrides {
  startingHealth?: number;
  maxHealth?: number;
  hazardDamage?: number;
  hazards?: HazardSchedule;
  allowMissingMoves?: boolean;
  defaultMove?: Direction;
  /** Royale only, ignored when `hazards` is given */
  shrinkEveryNTurns?: number;
  /** Seed for the royale shrink order */
  seed?: number;
  /** null turns squad rules off, a partial object adjusts them */
  squad?: Partial<SquadRules> | null;
}

interface RulesetPreset {
  wrapped: boolean;
  growth: GrowthPolicy;
  royale: boolean;
  squad: boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const RULESET_DEFAULTS = {
  startingHealth: 100,
  maxHealth: 100,
  hazardDamage: 14,
  shrinkEveryNTurns: 25,
  defaultMove: 'up',
} as const;

const PRESETS: Record<RulesetName, RulesetPreset> = {
  'standard':            { wrapped: false, growth: 'normal',      royale: false, squad: false },
  'solo':                { wrapped: false, growth: 'normal',      royale: false, squad: false },
  'wrapped':             { wrapped: true,  growth: 'normal',      royale: false, squad: false },
  'constrictor':         { wrapped: false, growth: 'constrictor', royale: false, squad: false },
  'wrapped-constrictor': { wrapped: true,  growth: 'constrictor', royale: false, squad: false },
  'royale':              { wrapped: false, growth: 'normal',      royale: true,  squad: false },
  'squad':               { wrapped: false, growth: 'normal',      royale: false, squad: true },
};

export const RULESET_NAMES: readonly RulesetName[] = [
  'standard', 'solo', 'wrapped', 'constrictor', 'wrapped-constrictor', 'royale', 'squad',
];

const SQUAD_DEFAULTS: SquadRules = {
  allowBodyCollisions: true,
  sharedElimination: true,
  sharedHealth: true,
  sharedLength: true,
};

const SQUAD_OFF: SquadRules = {
  allowBodyCollisions: false,
  sharedElimination: false,
  sharedHealth: false,
  sharedLength: false,
};

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function isRulesetName(name: string): name is RulesetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

function resolveSquad(preset: RulesetPreset, overrides: RulesetOverrides): Readonly<SquadRules> | null {
  if (overrides.squad === null) return null;
  if (!preset.squad && overrides.squad === undefined) return null;
  const base = preset.squad ? SQUAD_DEFAULTS : SQUAD_OFF;
  return Object.freeze({ ...base, ...overrides.squad });
}

/**
 * Build a ruleset from a preset name and optional overrides
 */
export function createRuleset(name: string, overrides: RulesetOverrides = {}): Ruleset {
  if (!isRulesetName(name)) {
    throw new ContractViolationError(
      'unknown-ruleset',
      `Unknown ruleset: ${name}. Available: ${RULESET_NAMES.join(', ')}`,
    );
  }
  const preset = PRESETS[name];

  const maxHealth = overrides.maxHealth ?? RULESET_DEFAULTS.maxHealth;
  const startingHealth = overrides.startingHealth ?? Math.min(RULESET_DEFAULTS.startingHealth, maxHealth);
  if (!(maxHealth > 0) || !(startingHealth > 0) || startingHealth > maxHealth) {
    throw new ContractViolationError(
      'invalid-health',
      `Starting health ${startingHealth} must be in (0, ${maxHealth}]`,
    );
  }

  const hazards = overrides.hazards ?? (preset.royale
    ? royaleShrink({
      everyNTurns: overrides.shrinkEveryNTurns ?? RULESET_DEFAULTS.shrinkEveryNTurns,
      seed: overrides.seed ?? 0,
    })
    : STATIC_HAZARDS);

  return Object.freeze({
    name,
    wrapped: preset.wrapped,
    startingHealth,
    maxHealth,
    hazardDamage: overrides.hazardDamage ?? RULESET_DEFAULTS.hazardDamage,
    hazards,
    growth: preset.growth,
    squad: resolveSquad(preset, overrides),
    allowMissingMoves: overrides.allowMissingMoves ?? false,
    defaultMove: overrides.defaultMove ?? RULESET_DEFAULTS.defaultMove,
  });
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Key of the side an agent plays for. Without squad rules every agent is its
 * own side.
 */
export function teamOf(rules: Ruleset, agent: Agent): string {
  if (rules.squad && agent.team !== null) return `team:${agent.team}`;
  return `agent:${agent.id}`;
}

/**
 * Whether `mover` survives running into `owner`'s body or head.
 * Only teammates under allowBodyCollisions are exempt; an agent is never
 * exempt from its own body.
 */
export function isCollisionExempt(rules: Ruleset, mover: Agent, owner: Agent): boolean {
  if (!rules.squad?.allowBodyCollisions) return false;
  if (mover.id === owner.id) return false;
  return mover.team !== null && mover.team === owner.team;
}

export function hazardsOn(rules: Ruleset, turn: number, dims: Dimensions): readonly Position[] | null {
  return rules.hazards.hazardsOn(turn, dims);
}
