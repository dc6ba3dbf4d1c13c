import { describe, it, expect } from 'vitest';
import { eliminationStatus, freezeAgent, headOf, isLiving, neckOf, tailOf } from './agent.js';

describe('agent.ts', () => {
  const agent = freezeAgent({
    id: 'a',
    name: 'a',
    body: [{ x: 3, y: 3 }, { x: 3, y: 3 }, { x: 3, y: 2 }, { x: 2, y: 2 }],
    health: 100,
    team: null,
    eliminated: null,
  });

  it('reads head, neck and tail past stacked segments', () => {
    expect(headOf(agent)).toEqual({ x: 3, y: 3 });
    expect(neckOf(agent)).toEqual({ x: 3, y: 2 });
    expect(tailOf(agent)).toEqual({ x: 2, y: 2 });
  });

  it('reports elimination status', () => {
    expect(isLiving(agent)).toBe(true);
    expect(eliminationStatus(agent)).toBe('none');

    const out = freezeAgent({ ...agent, eliminated: { cause: 'collided-wall', turn: 2, by: null } });
    expect(isLiving(out)).toBe(false);
    expect(eliminationStatus(out)).toBe('collided-wall');
  });

  it('freezes the body', () => {
    expect(Object.isFrozen(agent.body)).toBe(true);
    expect(Object.isFrozen(agent.body[0])).toBe(true);
  });

  it('refuses an empty body', () => {
    const empty = freezeAgent({ ...agent, body: [] });
    expect(() => headOf(empty)).toThrow('Agent a has no body');
  });
});
