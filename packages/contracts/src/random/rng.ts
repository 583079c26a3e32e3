/**
 * Utility functions for random operations using any number generator
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random choice from an array
 * @param rng - Random number generator function (returns 0 to 1)
 * @returns A random element, or undefined when the array is empty
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  const index = range(rng, 0, array.length - 1);
  return array[index];
}

/**
 * Draw `count` distinct elements (by position) without replacement.
 * The count is clamped to the array length.
 */
export function sample<T>(
  rng: () => number,
  array: readonly T[],
  count: number,
): T[] {
  const pool: T[] = Array.from(array);
  const taken = Math.max(0, Math.min(count, pool.length));
  const result: T[] = [];

  // Partial Fisher-Yates: only the first `taken` slots are settled.
  for (let i = 0; i < taken; i++) {
    const j = range(rng, i, pool.length - 1);
    const picked = pool[j] as T;
    pool[j] = pool[i] as T;
    pool[i] = picked;
    result.push(picked);
  }
  return result;
}

/**
 * Boolean with given probability
 * @param rng - Random number generator function (returns 0 to 1)
 * @param chance - The probability (0 to 1) of returning true
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
