import { BOARD_GLYPHS, BOARD_SIZE } from './config';
import { getTimeLeftSec } from './round';
import type { RoundState } from './types';

export const WELCOME_TEXT = [
  'Welcome to Raven Chase!',
  `Move around and eat as many mushrooms (${BOARD_GLYPHS.item}) as you can while avoiding the raven (${BOARD_GLYPHS.adversary})!`,
  'Each round lasts 1 minute. When you collect enough mushrooms, you\'ll level up.',
  'Use the buttons below to move.',
].join('\n');

export const NOT_STARTED_TEXT = 'Game not started. Use /start to begin.';

export function renderStats(state: RoundState, nowMs: number): string {
  return (
    `Level: ${state.level}  Score: ${state.score}  Collected: ${state.collected}/${state.required}\n` +
    `Time Left: ${getTimeLeftSec(state, nowMs)}s`
  );
}

export function renderBoard(state: RoundState, nowMs: number): string {
  const rows: string[][] = [];
  for (let y = 0; y < BOARD_SIZE; y += 1) {
    rows.push(new Array<string>(BOARD_SIZE).fill(BOARD_GLYPHS.empty));
  }

  const paint = (x: number, y: number, glyph: string) => {
    const row = rows[y];
    if (row && x >= 0 && x < row.length) row[x] = glyph;
  };

  // later paints win: items, then adversary, then player
  for (const item of state.items) {
    paint(item.x, item.y, BOARD_GLYPHS.item);
  }
  paint(state.adversaryPosition.x, state.adversaryPosition.y, BOARD_GLYPHS.adversary);
  paint(state.playerPosition.x, state.playerPosition.y, BOARD_GLYPHS.player);

  const boardText = rows.map((row) => row.join('')).join('\n');
  return `${boardText}\n${renderStats(state, nowMs)}`;
}

export function renderWelcome(state: RoundState, nowMs: number): string {
  return `${WELCOME_TEXT}\n\n${renderBoard(state, nowMs)}`;
}

export function renderLevelUp(state: RoundState, nowMs: number): string {
  return `Time's up! You progressed to level ${state.level}!\n\n${renderBoard(state, nowMs)}`;
}

export function renderTimeUp(finalScore: number): string {
  return `Time's up! Game over! You didn't collect enough mushrooms.\nFinal score: ${finalScore}`;
}

export function renderCaught(finalScore: number): string {
  return `Oh no! The raven caught you. Game over!\nFinal score: ${finalScore}`;
}
