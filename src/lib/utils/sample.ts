export type RandomSource = () => number;

/**
 * Draws `size` distinct elements (partial Fisher-Yates). The size is clamped
 * to the population, and a non-positive size yields an empty sample.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  size: number,
  random: RandomSource = Math.random,
): T[] {
  const take = Math.min(Math.max(0, Math.floor(size)), items.length);
  const pool = items.slice();
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
