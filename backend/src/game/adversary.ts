import { BOARD_SIZE } from './config';
import type { GameRng } from './rng';
import type { GridPosition, RoundState } from './types';

const WANDER_STEPS: ReadonlyArray<{ dx: number; dy: number }> = [
  { dx: -1, dy: 0 },
  { dx: 1, dy: 0 },
  { dx: 0, dy: -1 },
  { dx: 0, dy: 1 },
];

function manhattan(a: GridPosition, b: GridPosition): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function findNearestItem(from: GridPosition, items: readonly GridPosition[]): GridPosition | null {
  let best: GridPosition | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const item of items) {
    const distance = manhattan(from, item);
    // strict less-than keeps the first item on ties
    if (distance < bestDistance) {
      best = item;
      bestDistance = distance;
    }
  }

  return best;
}

function wander(from: GridPosition, rng: GameRng): GridPosition {
  const options: GridPosition[] = [];
  for (const { dx, dy } of WANDER_STEPS) {
    const x = from.x + dx;
    const y = from.y + dy;
    if (x < 0 || y < 0 || x >= BOARD_SIZE || y >= BOARD_SIZE) continue;
    options.push({ x, y });
  }

  if (options.length === 0) return { ...from };
  return options[rng.nextInt(options.length)] ?? { ...from };
}

/**
 * Moves the adversary one greedy step (diagonals allowed) toward the nearest
 * item, or one random orthogonal step when the board has no items.
 */
export function stepAdversary(state: RoundState, rng: GameRng): GridPosition {
  const from = state.adversaryPosition;
  const target = findNearestItem(from, state.items);

  const next = target
    ? { x: from.x + Math.sign(target.x - from.x), y: from.y + Math.sign(target.y - from.y) }
    : wander(from, rng);

  state.adversaryPosition = next;
  return next;
}
