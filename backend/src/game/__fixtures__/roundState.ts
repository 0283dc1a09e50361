import type { RoundState } from '../types';

/** Hand-built round for tests: no items, default spawn points. */
export function makeRoundState(overrides: Partial<RoundState> = {}): RoundState {
  return {
    level: 1,
    score: 0,
    collected: 0,
    required: 3,
    playerPosition: { x: 0, y: 0 },
    adversaryPosition: { x: 9, y: 9 },
    items: [],
    roundStartedAtMs: 0,
    ownerId: 'u1',
    ownerLabel: 'Alice',
    ...overrides,
  };
}
