/** Source of uniformly distributed numbers in `[0, 1)`, shaped like {@link Math.random}. */
export type RandomSource = () => number;

/**
 * Mulberry32 generator. Two sources created with the same seed produce the
 * same sequence, which keeps randomised node orderings reproducible in tests.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Weighted shuffle without replacement: repeatedly draws one remaining item
 * with probability proportional to its weight, removes it and appends it to
 * the order. Missing weights default to a uniform draw. When every remaining
 * weight is zero the draw falls back to uniform among the remaining items.
 */
export function weightedShuffle<T>(items: readonly T[], weights?: readonly number[], random: RandomSource = Math.random): T[] {
  if (weights && weights.length !== items.length) {
    throw new RangeError(`expected ${items.length} weights, received ${weights.length}`);
  }
  const remaining = items.map((item, index) => ({ item, weight: weights ? weights[index] : 1 }));
  const order: T[] = [];

  while (remaining.length > 0) {
    const total = remaining.reduce((sum, entry) => sum + entry.weight, 0);
    let picked = remaining.length - 1;
    if (total > 0) {
      // Rounding can leave the threshold non-negative after the scan.
      picked = lastPositiveIndex(remaining);
      let threshold = random() * total;
      for (let index = 0; index < remaining.length; index += 1) {
        threshold -= remaining[index].weight;
        if (threshold < 0) {
          picked = index;
          break;
        }
      }
    } else {
      picked = Math.min(remaining.length - 1, Math.floor(random() * remaining.length));
    }
    const [entry] = remaining.splice(picked, 1);
    order.push(entry.item);
  }

  return order;
}

function lastPositiveIndex(entries: ReadonlyArray<{ weight: number }>): number {
  for (let index = entries.length - 1; index >= 0; index -= 1) {
    if (entries[index].weight > 0) {
      return index;
    }
  }
  return entries.length - 1;
}
