/**
 * Seeded PRNG (mulberry32). Every stochastic step in the backtest draws from
 * one of these so a recorded seed reproduces the run exactly.
 */
export type Rng = () => number;

export const createRng = (seed: number): Rng => {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const randomIndex = (rng: Rng, length: number): number => Math.floor(rng() * length);
