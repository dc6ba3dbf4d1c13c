/**
 * Wire adapter: Battlesnake API game JSON to and from GameState
 */

import { z } from 'zod';

import { isLiving } from './agent.js';
import type { Agent, AgentInit } from './agent.js';
import { ContractViolationError, WireFormatError } from './errors.js';
import { createGameState } from './game-state.js';
import type { GameState } from './game-state.js';
import type { Position } from './geometry.js';
import { spiralHazards } from './hazards.js';
import { SILENT_LOGGER } from './logger.js';
import type { Logger } from './logger.js';
import { createRuleset, isRulesetName } from './rulesets.js';
import type { Ruleset, RulesetOverrides } from './rulesets.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

const SnakeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  health: z.number().int(),
  body: z.array(PositionSchema).min(1),
  head: PositionSchema,
  length: z.number().int().optional(),
  latency: z.union([z.string(), z.number()]).optional(),
  shout: z.string().nullable().optional(),
  squad: z.string().nullable().optional(),
});

const SettingsSchema = z.object({
  foodSpawnChance: z.number().optional(),
  minimumFood: z.number().optional(),
  hazardDamagePerTurn: z.number().int().nonnegative().optional(),
  hazardMap: z.string().optional(),
  hazardMapAuthor: z.string().optional(),
  royale: z.object({ shrinkEveryNTurns: z.number().int().nonnegative() }).partial().optional(),
  squad: z.object({
    allowBodyCollisions: z.boolean(),
    sharedElimination: z.boolean(),
    sharedHealth: z.boolean(),
    sharedLength: z.boolean(),
  }).partial().optional(),
});

export const WireGameSchema = z.object({
  game: z.object({
    id: z.string(),
    ruleset: z.object({
      name: z.string(),
      version: z.string(),
      settings: SettingsSchema.optional(),
    }),
    map: z.string().optional(),
    timeout: z.number(),
    source: z.string().optional(),
  }),
  turn: z.number().int().nonnegative(),
  board: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    food: z.array(PositionSchema),
    hazards: z.array(PositionSchema),
    snakes: z.array(SnakeSchema),
  }),
  you: SnakeSchema,
});

export type WireGame = z.infer<typeof WireGameSchema>;
export type WireSnake = z.infer<typeof SnakeSchema>;

export interface WireOptions {
  logger?: Logger;
  /** Seed for the royale shrink order */
  royaleSeed?: number;
  allowMissingMoves?: boolean;
}

const SPIRAL_MAP = 'hz_spiral';
const SPIRAL_EVERY_N_TURNS = 3;
const DEFAULT_RULESET_VERSION = 'v1.0.0';
const DEFAULT_TIMEOUT_MS = 500;

// ---------------------------------------------------------------------------
// Inbound
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON document as a Battlesnake game
 */
export function parseWireGame(json: unknown): WireGame {
  const result = WireGameSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new WireFormatError(issues);
  }
  return result.data;
}

/**
 * Snakes in processing order: `you` first, then the rest in board order
 */
export function buildAgentOrder(game: WireGame): WireSnake[] {
  return [game.you, ...game.board.snakes.filter(snake => snake.id !== game.you.id)];
}

function usesSpiralMap(game: WireGame): boolean {
  return game.game.map === SPIRAL_MAP || game.game.ruleset.settings?.hazardMap === SPIRAL_MAP;
}

export function rulesetFromWire(game: WireGame, options: WireOptions = {}): Ruleset {
  const logger = options.logger ?? SILENT_LOGGER;
  const settings = game.game.ruleset.settings;

  let name = game.game.ruleset.name;
  if (!isRulesetName(name)) {
    logger.warn('wire', `Unknown ruleset "${name}", falling back to standard`);
    name = 'standard';
  }

  const overrides: RulesetOverrides = {
    allowMissingMoves: options.allowMissingMoves,
    seed: options.royaleSeed,
    hazardDamage: settings?.hazardDamagePerTurn,
    squad: settings?.squad,
  };
  const shrinkEvery = settings?.royale?.shrinkEveryNTurns;
  if (shrinkEvery !== undefined && shrinkEvery > 0) overrides.shrinkEveryNTurns = shrinkEvery;

  const center = game.board.hazards[0];
  if (usesSpiralMap(game)) {
    if (game.board.hazards.length === 1 && center) {
      overrides.hazards = spiralHazards({ center, startTurn: game.turn, everyNTurns: SPIRAL_EVERY_N_TURNS });
      logger.debug('wire', `Spiral hazards centered on (${center.x}, ${center.y}) from turn ${game.turn}`);
    } else {
      logger.debug('wire', `Spiral map with ${game.board.hazards.length} hazards, keeping them static`);
    }
  }

  return createRuleset(name, overrides);
}

function agentFromWire(snake: WireSnake, turn: number): AgentInit {
  const out = snake.health <= 0;
  return {
    id: snake.id,
    name: snake.name,
    body: snake.body,
    health: out ? 0 : snake.health,
    team: snake.squad ? snake.squad : null,
    eliminated: out ? { cause: 'eliminated-by-opponent', turn, by: null } : null,
  };
}

/**
 * Convert a validated wire game to a GameState
 */
export function fromWire(game: WireGame, options: WireOptions = {}): GameState {
  const logger = options.logger ?? SILENT_LOGGER;
  const rules = rulesetFromWire(game, options);
  const agents = buildAgentOrder(game).map(snake => agentFromWire(snake, game.turn));

  const out = agents.filter(agent => agent.eliminated);
  if (out.length > 0) {
    logger.debug('wire', `Imported ${out.length} snake(s) with no health as eliminated`);
  }

  return createGameState({
    id: game.game.id,
    turn: game.turn,
    width: game.board.width,
    height: game.board.height,
    rules,
    agents,
    food: game.board.food,
    hazards: game.board.hazards,
    you: game.you.id,
  });
}

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

function copyPositions(positions: readonly Position[]): Position[] {
  return positions.map(pos => ({ x: pos.x, y: pos.y }));
}

function agentToWire(agent: Agent): WireSnake {
  const body = copyPositions(agent.body);
  return {
    id: agent.id,
    name: agent.name,
    health: agent.health,
    body,
    head: { ...body[0] },
    length: body.length,
    latency: '0',
    shout: '',
    squad: agent.team ?? '',
  };
}

/**
 * Encode a state as a wire game. Only living agents are written to the board.
 * The `game` section is copied from `template` when given.
 */
export function toWire(state: GameState, template?: WireGame): WireGame {
  const you = state.agents.find(agent => agent.id === state.you) ?? state.agents[0];
  if (!you) {
    throw new ContractViolationError('unknown-agent', 'Cannot encode a game without agents');
  }

  return {
    game: template?.game ?? {
      id: state.id,
      ruleset: { name: state.rules.name, version: DEFAULT_RULESET_VERSION },
      timeout: DEFAULT_TIMEOUT_MS,
    },
    turn: state.turn,
    board: {
      width: state.board.width,
      height: state.board.height,
      food: state.board.foodPositions(),
      hazards: state.board.hazardPositions(),
      snakes: state.agents.filter(isLiving).map(agentToWire),
    },
    you: agentToWire(you),
  };
}
