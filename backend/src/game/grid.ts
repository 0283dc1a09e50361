import { BOARD_SIZE } from './config';
import type { GridPosition } from './types';

export function toKey(x: number, y: number): string {
  return `${x},${y}`;
}

export function isSamePosition(a: GridPosition, b: GridPosition): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < BOARD_SIZE && y < BOARD_SIZE;
}

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

/**
 * One cell in `direction`, clamped to the board. Unknown directions are a no-op.
 */
export function clampMove(position: GridPosition, direction: string): GridPosition {
  let nx = position.x;
  let ny = position.y;

  switch (direction) {
    case 'up': ny -= 1; break;
    case 'down': ny += 1; break;
    case 'left': nx -= 1; break;
    case 'right': nx += 1; break;
  }

  return {
    x: clamp(nx, 0, BOARD_SIZE - 1),
    y: clamp(ny, 0, BOARD_SIZE - 1),
  };
}
