/** Uniform random source returning values in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic linear-congruential generator modulo 2^31. Same seed, same
 * sequence, so tests and `?seed=` URLs reproduce the initial orbital
 * phases. The multiply stays in 32-bit integer arithmetic; a float product
 * would drop the low bits the mask keeps.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.floor(Math.abs(seed)) & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}
