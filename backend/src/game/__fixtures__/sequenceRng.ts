import { fromFloatSource, type GameRng } from '../rng';

/**
 * Replays the given floats in order, then repeats the last one.
 */
export function createSequenceRng(values: number[]): GameRng {
  let idx = 0;
  return fromFloatSource(() => {
    if (values.length === 0) return 0;
    const value = values[Math.min(idx, values.length - 1)] ?? 0;
    idx += 1;
    return value;
  });
}
