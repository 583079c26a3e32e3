/**
 * Weighted categorical sampling.
 *
 * Weights are relative: a table does not need to sum to 1, and the draw is
 * taken against the table's own total. Entries with weight 0 are never drawn.
 */

/**
 * Running totals of `weights`. Negative weights count as 0.
 */
export function cumulativeWeights(weights: readonly number[]): number[] {
  const cumulative: number[] = [];
  let total = 0;
  for (const weight of weights) {
    total += Math.max(0, weight);
    cumulative.push(total);
  }
  return cumulative;
}

/**
 * Pick an index with probability proportional to its weight.
 *
 * Binary search for the first cumulative total strictly greater than the
 * scaled roll.
 *
 * @returns The chosen index, or -1 when no weight is positive
 */
export function weightedIndex(
  rng: () => number,
  weights: readonly number[],
): number {
  const cumulative = cumulativeWeights(weights);
  const total = cumulative[cumulative.length - 1] ?? 0;
  if (total <= 0) return -1;

  const roll = rng() * total;
  let lo = 0;
  let hi = cumulative.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((cumulative[mid] ?? 0) > roll) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

/**
 * Ordered `[value, weight]` pairs.
 */
export type WeightTable<T> = readonly (readonly [T, number])[];

/**
 * Pick a value of a weight table.
 *
 * @example
 * ```typescript
 * const kind = weightedChoice(() => rng.next(), [
 *   ["corridor", 0.4],
 *   ["chamber", 0.3],
 * ]);
 * ```
 */
export function weightedChoice<T>(
  rng: () => number,
  table: WeightTable<T>,
): T | undefined {
  const index = weightedIndex(
    rng,
    table.map(([, weight]) => weight),
  );
  return table[index]?.[0];
}
