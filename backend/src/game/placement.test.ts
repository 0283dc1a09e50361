import { describe, it, expect } from 'vitest';
import { makeRoundState } from './__fixtures__/roundState';
import { placeItem } from './placement';
import { createSequenceRng } from './__fixtures__/sequenceRng';
import { createDeterministicRng } from './rng';
import { toKey } from './grid';

describe('placeItem', () => {
  it('places an item on the sampled free cell', () => {
    const state = makeRoundState();
    const placed = placeItem(state, createSequenceRng([0.45, 0.65]));
    expect(placed).toEqual({ x: 4, y: 6 });
    expect(state.items).toEqual([{ x: 4, y: 6 }]);
  });

  it('resamples when the cell holds the player or another item', () => {
    const state = makeRoundState({ items: [{ x: 2, y: 2 }] });
    // (0,0) is the player, (2,2) an item, (4,6) is free
    const rng = createSequenceRng([0.05, 0.05, 0.25, 0.25, 0.45, 0.65]);
    expect(placeItem(state, rng)).toEqual({ x: 4, y: 6 });
    expect(state.items).toEqual([{ x: 2, y: 2 }, { x: 4, y: 6 }]);
  });

  it('resamples when the cell holds the adversary', () => {
    const state = makeRoundState();
    const rng = createSequenceRng([0.95, 0.95, 0.15, 0.35]);
    expect(placeItem(state, rng)).toEqual({ x: 1, y: 3 });
  });

  it('falls back to a row-major scan when sampling keeps colliding', () => {
    const state = makeRoundState();
    // always samples (0,0), which is the player
    const placed = placeItem(state, createSequenceRng([0]));
    expect(placed).toEqual({ x: 1, y: 0 });
  });

  it('does nothing once the board holds five items', () => {
    const items = [
      { x: 1, y: 1 },
      { x: 2, y: 2 },
      { x: 3, y: 3 },
      { x: 4, y: 4 },
      { x: 5, y: 5 },
    ];
    const state = makeRoundState({ items: [...items] });
    expect(placeItem(state, createSequenceRng([0.65, 0.65]))).toBeNull();
    expect(state.items).toEqual(items);
  });

  it('keeps items unique, off the actors and capped at five', () => {
    const state = makeRoundState();
    const rng = createDeterministicRng(1234);
    for (let i = 0; i < 50; i += 1) {
      placeItem(state, rng);
    }

    expect(state.items).toHaveLength(5);
    const keys = new Set(state.items.map((item) => toKey(item.x, item.y)));
    expect(keys.size).toBe(5);
    expect(keys.has('0,0')).toBe(false);
    expect(keys.has('9,9')).toBe(false);
  });
});
