/**
 * Seeded pseudo-random generator (mulberry32). Returns floats in [0, 1).
 */
export function seededRandom(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fresh 32-bit seed from `Math.random`. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}

/** Uniform integer in [0, n). */
export function randomInt(random: () => number, n: number): number {
  return Math.floor(random() * n);
}
