/**
 * Returns a float in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Mulberry32 generator. String seeds are hashed first (FNV-1a), so
 * `createSeededRandom("campaign-1")` replays the same sequence every run.
 */
export function createSeededRandom(seed: number | string): RandomSource {
  let current = (typeof seed === "string" ? hashSeed(seed) : seed) >>> 0;
  return () => {
    current = (current + 0x6d2b79f5) | 0;
    let t = Math.imul(current ^ (current >>> 15), 1 | current);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
