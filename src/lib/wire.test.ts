import { describe, it, expect, vi } from 'vitest';
import { WireFormatError } from './errors.js';
import { getAgent } from './game-state.js';
import type { Logger } from './logger.js';
import { buildAgentOrder, fromWire, parseWireGame, rulesetFromWire, toWire } from './wire.js';
import type { WireGame, WireSnake } from './wire.js';

function snake(id: string, body: [number, number][], extra: Partial<WireSnake> = {}): WireSnake {
  const cells = body.map(([x, y]) => ({ x, y }));
  return { id, name: `snake-${id}`, health: 90, body: cells, head: cells[0], length: cells.length, ...extra };
}

function wireGame(overrides: { name?: string; settings?: NonNullable<WireGame['game']['ruleset']['settings']>; map?: string } = {}): WireGame {
  const you = snake('you', [[1, 1], [1, 0], [1, 0]]);
  return {
    game: {
      id: 'game-1',
      ruleset: { name: overrides.name ?? 'standard', version: 'v1.2.3', settings: overrides.settings },
      map: overrides.map,
      timeout: 500,
    },
    turn: 4,
    board: {
      width: 7,
      height: 7,
      food: [{ x: 3, y: 3 }],
      hazards: [{ x: 6, y: 6 }],
      snakes: [snake('other', [[5, 5], [5, 4], [5, 3]]), you],
    },
    you,
  };
}

describe('wire.ts', () => {
  it('parses a valid document', () => {
    const json: unknown = JSON.parse(JSON.stringify(wireGame()));
    expect(parseWireGame(json).board.snakes).toHaveLength(2);
  });

  it('lists what is wrong with a malformed document', () => {
    const json: unknown = JSON.parse(JSON.stringify({ ...wireGame(), turn: 'four' }));
    expect(() => parseWireGame(json)).toThrow(WireFormatError);
    try {
      parseWireGame(json);
    } catch (e) {
      expect(e instanceof WireFormatError ? e.issues : []).toEqual(['turn: Expected number, received string']);
    }
  });

  it('puts you first', () => {
    expect(buildAgentOrder(wireGame()).map(s => s.id)).toEqual(['you', 'other']);
  });

  it('maps ruleset settings onto the preset', () => {
    const rules = rulesetFromWire(wireGame({
      name: 'royale',
      settings: { hazardDamagePerTurn: 7, royale: { shrinkEveryNTurns: 10 } },
    }));
    expect(rules.name).toBe('royale');
    expect(rules.hazardDamage).toBe(7);
    expect(rules.hazards.hazardsOn(5, { width: 7, height: 7, wrapped: false })).toBeNull();
    expect(rules.hazards.hazardsOn(10, { width: 7, height: 7, wrapped: false })).toHaveLength(7);
  });

  it('passes squad settings through', () => {
    const rules = rulesetFromWire(wireGame({ name: 'squad', settings: { squad: { sharedHealth: false } } }));
    expect(rules.squad).toEqual({
      allowBodyCollisions: true,
      sharedElimination: true,
      sharedHealth: false,
      sharedLength: true,
    });
  });

  it('falls back to standard for an unknown ruleset and says so', () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const rules = rulesetFromWire(wireGame({ name: 'tag' }), { logger });
    expect(rules.name).toBe('standard');
    expect(warn).toHaveBeenCalledWith('wire', 'Unknown ruleset "tag", falling back to standard');
  });

  it('grows a spiral from a single hazard on the spiral map', () => {
    const rules = rulesetFromWire(wireGame({ map: 'hz_spiral' }));
    expect(rules.hazards.kind).toBe('spiral');
    expect(rules.hazards.hazardsOn(6, { width: 7, height: 7, wrapped: false })).toEqual([{ x: 6, y: 6 }]);
  });

  it('builds a state with you first', () => {
    const state = fromWire(wireGame());
    expect(state.id).toBe('game-1');
    expect(state.turn).toBe(4);
    expect(state.you).toBe('you');
    expect(state.agents.map(agent => agent.id)).toEqual(['you', 'other']);
    expect(getAgent(state, 'you').body).toEqual([{ x: 1, y: 1 }, { x: 1, y: 0 }, { x: 1, y: 0 }]);
    expect(state.board.hasFood({ x: 3, y: 3 })).toBe(true);
    expect(state.board.hasHazard({ x: 6, y: 6 })).toBe(true);
  });

  it('imports a snake without health as already eliminated', () => {
    const game = wireGame();
    game.board.snakes[0] = snake('other', [[5, 5], [5, 4], [5, 3]], { health: 0 });
    const state = fromWire(game);
    expect(getAgent(state, 'other').eliminated).toEqual({ cause: 'eliminated-by-opponent', turn: 4, by: null });
    expect(state.terminal).toBe(true);
    expect(state.winnerId).toBe('you');
  });

  it('reads squad names as teams', () => {
    const game = wireGame({ name: 'squad' });
    game.board.snakes[0] = snake('other', [[5, 5], [5, 4], [5, 3]], { squad: '1' });
    game.you = snake('you', [[1, 1], [1, 0], [1, 0]], { squad: '' });
    const state = fromWire(game);
    expect(getAgent(state, 'other').team).toBe('1');
    expect(getAgent(state, 'you').team).toBeNull();
  });

  it('writes living snakes back out', () => {
    const state = fromWire(wireGame());
    const out = toWire(state, wireGame());
    expect(out.game.id).toBe('game-1');
    expect(out.board.food).toEqual([{ x: 3, y: 3 }]);
    expect(out.you).toEqual({
      id: 'you',
      name: 'snake-you',
      health: 90,
      body: [{ x: 1, y: 1 }, { x: 1, y: 0 }, { x: 1, y: 0 }],
      head: { x: 1, y: 1 },
      length: 3,
      latency: '0',
      shout: '',
      squad: '',
    });

    const back = fromWire(parseWireGame(JSON.parse(JSON.stringify(out))));
    expect(back.agents).toEqual(state.agents);
    expect(back.board).toEqual(state.board);
  });

  it('leaves eliminated snakes off the board', () => {
    const game = wireGame();
    game.board.snakes[0] = snake('other', [[5, 5], [5, 4], [5, 3]], { health: 0 });
    const out = toWire(fromWire(game));
    expect(out.board.snakes.map(s => s.id)).toEqual(['you']);
    expect(out.game.ruleset).toEqual({ name: 'standard', version: 'v1.0.0' });
  });
});
