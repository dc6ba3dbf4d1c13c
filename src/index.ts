/**
 * battlesnake-engine -- Battlesnake game state and simultaneous-move resolution
 *
 * Exports the state model, the simulator, read-only queries, rulesets and
 * the Battlesnake API wire adapter.
 */

export {
  DIRECTION_OFFSETS,
  ALL_DIRECTIONS,
  isDirection,
  parseDirection,
  samePosition,
  isInBounds,
  isValid,
  normalize,
  neighbor,
  directionBetween,
  toIndex,
  fromIndex,
} from './lib/geometry.js';
export type { Position, Direction, Dimensions } from './lib/geometry.js';

export { Board, BoardBuilder, CELL_BODY, CELL_FOOD, CELL_HAZARD, cellFlags } from './lib/board.js';
export type { CellBit, CellFlags, BoardLayers } from './lib/board.js';

export { eliminationStatus, headOf, neckOf, tailOf, isLiving } from './lib/agent.js';
export type { Agent, AgentInit, Elimination, EliminationCause, EliminationStatus } from './lib/agent.js';

export { createGameState, aliveAgents, getAgent, findAgent, evaluateTerminal } from './lib/game-state.js';
export type { GameState, GameStateInit, TerminalStatus } from './lib/game-state.js';

export {
  STATIC_HAZARDS,
  royaleShrink,
  royaleSafeArea,
  spiralHazards,
  spiralHazardCells,
} from './lib/hazards.js';
export type { HazardSchedule, RoyaleOptions, SafeArea, SpiralOptions } from './lib/hazards.js';

export {
  RULESET_DEFAULTS,
  RULESET_NAMES,
  createRuleset,
  isRulesetName,
  teamOf,
  isCollisionExempt,
  hazardsOn,
} from './lib/rulesets.js';
export type { Ruleset, RulesetName, RulesetOverrides, GrowthPolicy, SquadRules } from './lib/rulesets.js';

export {
  simulate,
  simulateWithMoves,
  simulateAll,
  randomReasonableMoves,
  playout,
} from './lib/simulator.js';
export type { MoveSet, CandidateSet, Branch, SimulateOptions, SimulatorInstruments } from './lib/simulator.js';

export {
  isTerminal,
  winner,
  winningTeam,
  outcome,
  isTerminalFor,
  isAlive,
  aliveCount,
  agentHealth,
  agentLength,
  agentHead,
  isNeck,
  neighbors,
  possibleMoves,
  lethalCause,
  isLethalMove,
  validDirections,
} from './lib/queries.js';
export type { Outcome } from './lib/queries.js';

export { ContractViolationError, WireFormatError } from './lib/errors.js';
export type { ContractViolationCode } from './lib/errors.js';

export { createRNG, hashSeed, randomInt } from './lib/rng.js';
export type { RNG } from './lib/rng.js';

export { createLogger, resolveLogLevel, SILENT_LOGGER, LOG_LEVEL_ENV } from './lib/logger.js';
export type { Logger, LogLevel } from './lib/logger.js';

export { WireGameSchema, parseWireGame, buildAgentOrder, rulesetFromWire, fromWire, toWire } from './lib/wire.js';
export type { WireGame, WireSnake, WireOptions } from './lib/wire.js';

export { formatBoard } from './lib/format.js';
