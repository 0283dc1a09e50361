export const GAME_CONFIG = {
  boardSize: 10,
  roundDurationMs: 60_000,
  maxItems: 5,
  initialItems: 3,
  initialRequired: 3,
  requiredStepPerLevel: 2,
  itemScore: 10,
  spawnChance: 0.3,
  placementMaxAttempts: 64,
} as const;

export const BOARD_SIZE = GAME_CONFIG.boardSize;

export const BOARD_GLYPHS = {
  empty: '⬜',
  item: '🍄',
  adversary: '🐦',
  player: '🙂',
} as const;
