#!/usr/bin/env node
/**
 * Battlesnake turn simulator
 *
 * Loads a Battlesnake API game document, then either applies one turn of
 * given moves or plays out a number of turns with seeded random moves, and
 * prints the resulting board.
 *
 * Usage:
 *   battlesnake-sim <game.json> [id=direction ...] [--turns N] [--seed S]
 *                   [--royale-seed S] [--json] [--log-level L]
 */

import { readFileSync } from 'fs';
import { parseArgs } from 'util';

import { formatBoard } from '../lib/format.js';
import type { GameState } from '../lib/game-state.js';
import { parseDirection } from '../lib/geometry.js';
import type { Direction } from '../lib/geometry.js';
import { createLogger, LOG_LEVEL_ENV, resolveLogLevel } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { outcome, winner } from '../lib/queries.js';
import { createRNG } from '../lib/rng.js';
import { playout, simulate } from '../lib/simulator.js';
import type { SimulatorInstruments } from '../lib/simulator.js';
import { fromWire, parseWireGame, toWire } from '../lib/wire.js';

const USAGE = 'Usage: battlesnake-sim <game.json> [id=direction ...] [--turns N] [--seed S] [--royale-seed S] [--json] [--log-level L]';

/**
 * Parse `id=direction` pairs into a move record
 */
function parseMovePairs(pairs: readonly string[]): Record<string, Direction> {
  const moves: Record<string, Direction> = {};
  for (const pair of pairs) {
    const at = pair.lastIndexOf('=');
    if (at <= 0) throw new Error(`Expected id=direction, got "${pair}"`);
    moves[pair.slice(0, at)] = parseDirection(pair.slice(at + 1));
  }
  return moves;
}

function parseInteger(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new Error(`--${flag} expects an integer, got "${raw}"`);
  return value;
}

function timingInstruments(logger: Logger): SimulatorInstruments {
  return {
    observeSimulation(ms) {
      logger.debug('simulator', `turn resolved in ${ms.toFixed(3)}ms`);
    },
  };
}

function printState(state: GameState, asJson: boolean): void {
  if (asJson) {
    console.log(JSON.stringify(toWire(state), null, 2));
    return;
  }
  console.log(`Turn ${state.turn}`);
  console.log(formatBoard(state));
  const result = outcome(state);
  const won = winner(state);
  console.log(`Outcome: ${result}${won ? ` (winner: ${won})` : ''}`);
}

// --- CLI ---
async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      turns: { type: 'string', short: 't', default: '1' },
      seed: { type: 'string', short: 's' },
      'royale-seed': { type: 'string' },
      json: { type: 'boolean', default: false },
      'log-level': { type: 'string' },
    },
    allowPositionals: true,
  });

  const [file, ...pairs] = positionals;
  if (!file) throw new Error(USAGE);

  const logger = createLogger(resolveLogLevel(values['log-level'] ?? process.env[LOG_LEVEL_ENV]));
  const instruments = timingInstruments(logger);

  const game = parseWireGame(JSON.parse(readFileSync(file, 'utf8')));
  const start = fromWire(game, {
    logger,
    royaleSeed: parseInteger(values['royale-seed'], 'royale-seed'),
  });
  logger.info('cli', `Loaded ${file}: ${start.agents.length} snakes, ${start.board.width}x${start.board.height}, ruleset ${start.rules.name}`);

  let final: GameState;
  if (pairs.length > 0) {
    final = simulate(start, parseMovePairs(pairs), { instruments });
  } else {
    const turns = parseInteger(values.turns, 'turns') ?? 1;
    const { rng, seed } = createRNG(parseInteger(values.seed, 'seed'));
    logger.info('cli', `Playing out ${turns} turn(s) with seed ${seed}`);
    const states = playout(start, turns, rng, { instruments });
    final = states[states.length - 1];
  }

  printState(final, values.json);
}

main().catch((e: Error) => {
  console.error('Fatal:', e.message);
  process.exit(1);
});
