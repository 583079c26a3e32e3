/**
 * Anything that yields uniformly distributed doubles in [0, 1).
 *
 * Generators take one of these per request so tests can pin the sequence.
 */
export interface RandomSource {
  next(): number;
}
