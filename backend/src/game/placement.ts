import { BOARD_SIZE, GAME_CONFIG } from './config';
import { toKey } from './grid';
import type { GameRng } from './rng';
import type { GridPosition, RoundState } from './types';

function occupiedKeys(state: RoundState): Set<string> {
  const keys = new Set<string>();
  keys.add(toKey(state.playerPosition.x, state.playerPosition.y));
  keys.add(toKey(state.adversaryPosition.x, state.adversaryPosition.y));
  for (const item of state.items) {
    keys.add(toKey(item.x, item.y));
  }
  return keys;
}

function firstFreeCell(occupied: Set<string>): GridPosition | null {
  for (let y = 0; y < BOARD_SIZE; y += 1) {
    for (let x = 0; x < BOARD_SIZE; x += 1) {
      if (!occupied.has(toKey(x, y))) return { x, y };
    }
  }
  return null;
}

/**
 * Drops one item on a random free cell. Returns the new item, or null when the
 * board already holds the maximum or has no free cell left.
 */
export function placeItem(state: RoundState, rng: GameRng): GridPosition | null {
  if (state.items.length >= GAME_CONFIG.maxItems) return null;

  const occupied = occupiedKeys(state);

  let cell: GridPosition | null = null;
  for (let attempt = 0; attempt < GAME_CONFIG.placementMaxAttempts; attempt += 1) {
    const x = rng.nextInt(BOARD_SIZE);
    const y = rng.nextInt(BOARD_SIZE);
    if (occupied.has(toKey(x, y))) continue;
    cell = { x, y };
    break;
  }

  // sampling kept hitting occupied cells
  cell = cell ?? firstFreeCell(occupied);
  if (!cell) return null;

  state.items.push(cell);
  return cell;
}
