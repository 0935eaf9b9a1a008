/**
 * Order-preserving list helpers.
 *
 * Generated text must be byte-identical across runs, so every merge keeps
 * first-seen order instead of relying on set iteration.
 */

export function concatMap<T, U>(items: Iterable<T>, fn: (item: T) => readonly U[]): U[] {
  const out: U[] = [];
  for (const item of items) out.push(...fn(item));
  return out;
}

/** Drop repeated values, keeping the first occurrence of each. */
export function dedupe<T>(items: Iterable<T>): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const item of items) {
    if (seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

/** Concatenate the lists, then drop repeats (first occurrence wins). */
export function orderedUnion<T>(...lists: readonly (readonly T[])[]): T[] {
  return dedupe(lists.flat());
}
