import { describe, it, expect } from 'vitest';
import { formatBoard } from './format.js';
import { createGameState } from './game-state.js';

describe('format.ts', () => {
  it('draws the board top row first with a line per living agent', () => {
    const state = createGameState({
      width: 3,
      height: 3,
      agents: [
        { id: 'a', body: [{ x: 1, y: 1 }, { x: 1, y: 0 }], health: 42 },
        { id: 'b', body: [{ x: 2, y: 0 }], health: 0, eliminated: { cause: 'starved', turn: 1, by: null } },
      ],
      food: [{ x: 0, y: 2 }],
      hazards: [{ x: 2, y: 2 }, { x: 0, y: 0 }],
    });

    expect(formatBoard(state)).toBe([
      'f . x',
      '. H .',
      'x s .',
      'a health=42 head=(1, 1)',
    ].join('\n'));
  });
});
