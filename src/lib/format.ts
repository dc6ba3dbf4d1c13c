/**
 * Plain-text board dump for debugging
 */

import { headOf, isLiving } from './agent.js';
import type { GameState } from './game-state.js';
import { samePosition } from './geometry.js';

/**
 * Render the board top row first. H marks a head, s a body segment, f food,
 * x hazard. Bodies win over food and food over hazard.
 */
export function formatBoard(state: GameState): string {
  const { board } = state;
  const living = state.agents.filter(isLiving);
  const heads = living.map(headOf);

  const lines: string[] = [];
  for (let y = board.height - 1; y >= 0; y--) {
    const row: string[] = [];
    for (let x = 0; x < board.width; x++) {
      const pos = { x, y };
      if (heads.some(head => samePosition(head, pos))) row.push('H');
      else if (board.hasBody(pos)) row.push('s');
      else if (board.hasFood(pos)) row.push('f');
      else if (board.hasHazard(pos)) row.push('x');
      else row.push('.');
    }
    lines.push(row.join(' '));
  }

  for (const agent of living) {
    const head = headOf(agent);
    lines.push(`${agent.id} health=${agent.health} head=(${head.x}, ${head.y})`);
  }
  return lines.join('\n');
}
