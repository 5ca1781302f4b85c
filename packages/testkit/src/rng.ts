/**
 * Seeded xorshift32 generator for reproducible property and fuzz tests.
 * A zero seed is remapped; xorshift never leaves the all-zero state.
 */
export type Rng = Readonly<{
  seed: number;
  u32: () => number;
}>;

const ZERO_SEED_FALLBACK = 0x9e3779b9;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  if (state === 0) state = ZERO_SEED_FALLBACK;
  const initial = state;

  return Object.freeze({
    seed: initial,
    u32(): number {
      state ^= state << 13;
      state >>>= 0;
      state ^= state >>> 17;
      state ^= state << 5;
      state >>>= 0;
      return state;
    },
  });
}
