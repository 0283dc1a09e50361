import { BOARD_SIZE, GAME_CONFIG } from './config';
import { stepAdversary } from './adversary';
import { clampMove, isSamePosition } from './grid';
import { placeItem } from './placement';
import type { GameRng } from './rng';
import type { GridPosition, RoundState, RoundStep } from './types';

export type RoundContext = {
  nowMs: number;
  rng: GameRng;
};

function playerSpawn(): GridPosition {
  return { x: 0, y: 0 };
}

function adversarySpawn(): GridPosition {
  return { x: BOARD_SIZE - 1, y: BOARD_SIZE - 1 };
}

function seedItems(state: RoundState, rng: GameRng): void {
  for (let i = 0; i < GAME_CONFIG.initialItems; i += 1) {
    placeItem(state, rng);
  }
}

export function createRound(params: {
  ownerId: string;
  ownerLabel: string;
  nowMs: number;
  rng: GameRng;
}): RoundState {
  const state: RoundState = {
    level: 1,
    score: 0,
    collected: 0,
    required: GAME_CONFIG.initialRequired,
    playerPosition: playerSpawn(),
    adversaryPosition: adversarySpawn(),
    items: [],
    roundStartedAtMs: params.nowMs,
    ownerId: params.ownerId,
    ownerLabel: params.ownerLabel,
  };

  seedItems(state, params.rng);
  return state;
}

export function isRoundExpired(state: RoundState, nowMs: number): boolean {
  return nowMs >= state.roundStartedAtMs + GAME_CONFIG.roundDurationMs;
}

export function getTimeLeftSec(state: RoundState, nowMs: number): number {
  const leftMs = state.roundStartedAtMs + GAME_CONFIG.roundDurationMs - nowMs;
  return Math.max(0, Math.floor(leftMs / 1000));
}

function advanceLevel(state: RoundState, ctx: RoundContext): void {
  state.level += 1;
  state.required += GAME_CONFIG.requiredStepPerLevel;
  state.collected = 0;
  state.playerPosition = playerSpawn();
  state.adversaryPosition = adversarySpawn();
  state.items = [];
  seedItems(state, ctx.rng);
  state.roundStartedAtMs = ctx.nowMs;
}

function collectAt(state: RoundState, position: GridPosition): GridPosition | null {
  const idx = state.items.findIndex((item) => isSamePosition(item, position));
  if (idx < 0) return null;

  const [item] = state.items.splice(idx, 1);
  state.score += GAME_CONFIG.itemScore;
  state.collected += 1;
  return item ?? null;
}

/**
 * Applies one player command to the round. The caller owns session removal
 * and score recording for terminal steps.
 */
export function advanceRound(state: RoundState, direction: string, ctx: RoundContext): RoundStep {
  if (isRoundExpired(state, ctx.nowMs)) {
    if (state.collected >= state.required) {
      advanceLevel(state, ctx);
      return { kind: 'level_up', level: state.level };
    }
    return { kind: 'time_up', finalScore: state.score };
  }

  state.playerPosition = clampMove(state.playerPosition, direction);
  const collectedItem = collectAt(state, state.playerPosition);

  stepAdversary(state, ctx.rng);

  if (isSamePosition(state.playerPosition, state.adversaryPosition)) {
    return { kind: 'caught', finalScore: state.score };
  }

  if (ctx.rng.nextFloat() < GAME_CONFIG.spawnChance) {
    placeItem(state, ctx.rng);
  }

  return { kind: 'moved', collectedItem };
}
