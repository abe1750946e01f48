/**
 * Deterministic random source for jitter.
 *
 * Linear congruential step, scaled to [0, 1).
 */
export type RandomSource = () => number;

export function createSeededRandom(seed: number): RandomSource {
  let state = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}
