/**
 * Seedable pseudo-random source threaded through every randomized stage of the
 * sampler (crawl truncation, palette, perturbation). Nothing in the pipeline
 * reads `Math.random`.
 */
export interface RandomSource {
  /** Uniform float in `[0, 1)`. */
  next(): number;
}

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 48271; // Park–Miller recommended multiplier

/**
 * Folds a seed token into a strictly positive 31-bit state with a polynomial
 * rolling hash. Numbers are hashed through their decimal representation so
 * `7` and `"7"` yield the same stream.
 */
export function deriveSeed(seed: number | string): number {
  const token = String(seed);
  let hash = 0;
  for (let index = 0; index < token.length; index += 1) {
    hash = (hash * 31 + token.charCodeAt(index)) % MODULUS;
  }
  // The generator needs a non-zero state.
  return hash === 0 ? 1 : hash;
}

/** Park–Miller minimal-standard generator. */
export function createSeededRandom(seed: number | string): RandomSource {
  let state = deriveSeed(seed);
  return {
    next: () => {
      state = (state * MULTIPLIER) % MODULUS;
      return (state - 1) / (MODULUS - 1);
    },
  };
}

/**
 * Derives an independent stream for one concern of a run, e.g.
 * `deriveStream(42, "crawl", "fr")`. Streams are keyed by name rather than
 * drawn from a shared generator so concurrent languages cannot change each
 * other's draws.
 */
export function deriveStream(seed: number | string, ...scope: string[]): RandomSource {
  return createSeededRandom([String(seed), ...scope].join("::"));
}

/** Single Bernoulli trial. `p <= 0` never succeeds; `p >= 1` always does. */
export function bernoulli(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

/** Uniform integer in `[0, bound)`. */
export function randomInt(rng: RandomSource, bound: number): number {
  return Math.min(bound - 1, Math.floor(rng.next() * bound));
}

/**
 * Uniform random subset of {@link count} items, returned in their original
 * order. Uses a partial Fisher–Yates shuffle over the indices.
 */
export function sampleInOrder<T>(rng: RandomSource, items: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  if (count >= items.length) {
    return [...items];
  }
  const indices = items.map((_, index) => index);
  for (let position = 0; position < count; position += 1) {
    const pick = position + randomInt(rng, indices.length - position);
    const swap = indices[position];
    indices[position] = indices[pick];
    indices[pick] = swap;
  }
  const chosen = indices.slice(0, count).sort((a, b) => a - b);
  return chosen.map((index) => items[index]);
}

/** Random `#RRGGBB` color, as used for the per-language vertex palette. */
export function randomHexColor(rng: RandomSource): string {
  const digits = "0123456789ABCDEF";
  let color = "#";
  for (let index = 0; index < 6; index += 1) {
    color += digits[randomInt(rng, digits.length)];
  }
  return color;
}
