import { describe, it, expect } from 'vitest';
import { ContractViolationError } from './errors.js';
import { aliveAgents, createGameState, findAgent, getAgent } from './game-state.js';
import type { GameStateInit } from './game-state.js';
import { createRuleset } from './rulesets.js';

function thrownCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof ContractViolationError) return e.code;
    throw e;
  }
  return null;
}

const base: GameStateInit = {
  width: 11,
  height: 11,
  agents: [
    { id: 'a', body: [{ x: 1, y: 1 }, { x: 1, y: 0 }] },
    { id: 'b', name: 'Bee', body: [{ x: 9, y: 9 }, { x: 9, y: 10 }], health: 40 },
  ],
  food: [{ x: 5, y: 5 }],
};

describe('game-state.ts', () => {
  it('fills in defaults from the ruleset', () => {
    const state = createGameState(base);
    expect(state.turn).toBe(0);
    expect(state.rules.name).toBe('standard');
    expect(getAgent(state, 'a')).toEqual({
      id: 'a',
      name: 'a',
      body: [{ x: 1, y: 1 }, { x: 1, y: 0 }],
      health: 100,
      team: null,
      eliminated: null,
    });
    expect(getAgent(state, 'b').name).toBe('Bee');
    expect(state.terminal).toBe(false);
    expect(state.winnerId).toBeNull();
  });

  it('marks living bodies and food on the board', () => {
    const state = createGameState(base);
    expect(state.board.hasBody({ x: 1, y: 0 })).toBe(true);
    expect(state.board.hasBody({ x: 9, y: 10 })).toBe(true);
    expect(state.board.foodPositions()).toEqual([{ x: 5, y: 5 }]);
  });

  it('freezes the state and its agents', () => {
    const state = createGameState(base);
    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.agents)).toBe(true);
    expect(Object.isFrozen(state.agents[0].body)).toBe(true);
  });

  it('rejects broken input with a contract code', () => {
    expect(thrownCode(() => createGameState({
      ...base,
      agents: [{ id: 'a', body: [{ x: 0, y: 0 }] }, { id: 'a', body: [{ x: 2, y: 2 }] }],
    }))).toBe('duplicate-agent');
    expect(thrownCode(() => createGameState({ ...base, agents: [{ id: 'a', body: [] }] }))).toBe('empty-body');
    expect(thrownCode(() => createGameState({
      ...base,
      agents: [{ id: 'a', body: [{ x: 11, y: 0 }] }],
    }))).toBe('invalid-position');
    expect(thrownCode(() => createGameState({
      ...base,
      agents: [{ id: 'a', body: [{ x: 0, y: 0 }], health: 0 }],
    }))).toBe('invalid-health');
    expect(thrownCode(() => createGameState({ ...base, width: 0 }))).toBe('invalid-dimensions');
    expect(thrownCode(() => createGameState({ ...base, you: 'z' }))).toBe('unknown-agent');
  });

  it('accepts an eliminated agent with no health', () => {
    const state = createGameState({
      ...base,
      agents: [
        ...base.agents,
        { id: 'c', body: [{ x: 4, y: 4 }], health: 0, eliminated: { cause: 'starved', turn: 3, by: null } },
      ],
    });
    expect(state.board.hasBody({ x: 4, y: 4 })).toBe(false);
    expect([...aliveAgents(state)].map(agent => agent.id)).toEqual(['a', 'b']);
  });

  it('normalizes positions on a wrapping board', () => {
    const state = createGameState({
      width: 7,
      height: 7,
      rules: createRuleset('wrapped'),
      agents: [{ id: 'a', body: [{ x: 7, y: -1 }, { x: 6, y: -1 }] }],
    });
    expect(getAgent(state, 'a').body).toEqual([{ x: 0, y: 6 }, { x: 6, y: 6 }]);
  });

  it('iterates living agents more than once', () => {
    const alive = aliveAgents(createGameState(base));
    expect([...alive].length).toBe(2);
    expect([...alive].length).toBe(2);
  });

  it('looks agents up by id', () => {
    const state = createGameState(base);
    expect(findAgent(state, 'z')).toBeUndefined();
    expect(() => getAgent(state, 'z')).toThrow('Unknown agent id: z');
  });

  it('treats a game without agents as over', () => {
    const state = createGameState({ width: 3, height: 3, agents: [] });
    expect(state.terminal).toBe(true);
    expect(state.winnerId).toBeNull();
  });

  it('ends a game that starts with one side left', () => {
    const state = createGameState({
      ...base,
      agents: [
        base.agents[0],
        { id: 'b', body: [{ x: 4, y: 4 }], health: 0, eliminated: { cause: 'starved', turn: 1, by: null } },
      ],
    });
    expect(state.terminal).toBe(true);
    expect(state.winnerId).toBe('a');
  });
});
