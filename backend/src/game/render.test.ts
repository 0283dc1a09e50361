import { describe, it, expect } from 'vitest';
import { makeRoundState } from './__fixtures__/roundState';
import {
  NOT_STARTED_TEXT,
  WELCOME_TEXT,
  renderBoard,
  renderCaught,
  renderLevelUp,
  renderStats,
  renderTimeUp,
  renderWelcome,
} from './render';

function cellsOf(line: string | undefined): string[] {
  return Array.from(line ?? '');
}

describe('renderBoard', () => {
  it('draws a 10x10 grid followed by two stat lines', () => {
    const state = makeRoundState({ items: [{ x: 1, y: 0 }] });
    const lines = renderBoard(state, 15_500).split('\n');

    expect(lines).toHaveLength(12);
    expect(lines[0]).toBe('🙂🍄' + '⬜'.repeat(8));
    expect(lines[5]).toBe('⬜'.repeat(10));
    expect(lines[9]).toBe('⬜'.repeat(9) + '🐦');
    expect(lines[10]).toBe('Level: 1  Score: 0  Collected: 0/3');
    expect(lines[11]).toBe('Time Left: 44s');
  });

  it('indexes rows by y and columns by x', () => {
    const state = makeRoundState({ items: [{ x: 2, y: 7 }] });
    const lines = renderBoard(state, 0).split('\n');
    expect(cellsOf(lines[7])[2]).toBe('🍄');
    expect(cellsOf(lines[2])[7]).toBe('⬜');
  });

  it('draws the player over the adversary and items', () => {
    const state = makeRoundState({
      playerPosition: { x: 3, y: 3 },
      adversaryPosition: { x: 3, y: 3 },
      items: [{ x: 3, y: 3 }],
    });
    const lines = renderBoard(state, 0).split('\n');
    expect(cellsOf(lines[3])[3]).toBe('🙂');
  });

  it('draws the adversary over an item', () => {
    const state = makeRoundState({ adversaryPosition: { x: 6, y: 2 }, items: [{ x: 6, y: 2 }] });
    const lines = renderBoard(state, 0).split('\n');
    expect(cellsOf(lines[2])[6]).toBe('🐦');
  });
});

describe('renderStats', () => {
  it('shows level, score, progress and the floored timer', () => {
    const state = makeRoundState({ level: 3, score: 120, collected: 4, required: 7, roundStartedAtMs: 10_000 });
    expect(renderStats(state, 80_000)).toBe('Level: 3  Score: 120  Collected: 4/7\nTime Left: 0s');
  });
});

describe('chat texts', () => {
  it('prefixes the board with the welcome text', () => {
    const state = makeRoundState();
    expect(renderWelcome(state, 0)).toBe(`${WELCOME_TEXT}\n\n${renderBoard(state, 0)}`);
  });

  it('announces the new level above the fresh board', () => {
    const state = makeRoundState({ level: 2, required: 5 });
    expect(renderLevelUp(state, 0)).toBe(`Time's up! You progressed to level 2!\n\n${renderBoard(state, 0)}`);
  });

  it('reports terminal outcomes with the final score', () => {
    expect(renderTimeUp(20)).toBe("Time's up! Game over! You didn't collect enough mushrooms.\nFinal score: 20");
    expect(renderCaught(30)).toBe('Oh no! The raven caught you. Game over!\nFinal score: 30');
  });

  it('tells the player how to start', () => {
    expect(NOT_STARTED_TEXT).toBe('Game not started. Use /start to begin.');
  });
});
