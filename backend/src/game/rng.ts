/**
 * Random source used by placement, adversary wandering and respawn rolls.
 * Game code never calls Math.random directly so tests can pin the sequence.
 */
export interface GameRng {
  nextFloat: () => number;
  nextInt: (maxExclusive: number) => number;
}

export function fromFloatSource(nextFloat: () => number): GameRng {
  return {
    nextFloat,
    nextInt: (maxExclusive: number) => {
      if (maxExclusive <= 0) return 0;
      return Math.floor(nextFloat() * maxExclusive);
    },
  };
}

export function createDeterministicRng(seed: number): GameRng {
  let state = seed >>> 0;

  return fromFloatSource(() => {
    // Mulberry32 variant.
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  });
}

export function createMathRng(): GameRng {
  return fromFloatSource(() => Math.random());
}
