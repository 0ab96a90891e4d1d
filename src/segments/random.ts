export type RandomSource = () => number;

/**
 * Mulberry32 - deterministic PRNG returning values in [0, 1)
 */
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
