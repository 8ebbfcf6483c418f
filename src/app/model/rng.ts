export type Rng = () => number;

export const RANDOM_SEED = -1;
export const MAX_GENERATED_SEED = 65535;

// mulberry32
export function createRng(seedInput: number): Rng {
  let seed = seedInput >>> 0;
  return () => {
    seed += 0x6d2b79f5;
    let t = seed;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function generateSeed() {
  return Math.floor(Math.random() * MAX_GENERATED_SEED);
}

export function resolveSeed(seed: number) {
  return seed === RANDOM_SEED ? generateSeed() : seed;
}
