import type { RandomSource } from "@cryptforge/contracts";

/**
 * Adapt a random source to the `() => number` shape the random helpers take.
 */
export function bindRandom(source: RandomSource): () => number {
  return () => source.next();
}
