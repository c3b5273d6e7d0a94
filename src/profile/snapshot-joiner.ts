export type JoinedMap<K, L, R = L> = Map<K, [L | undefined, R | undefined]>;

/**
 * Pair two maps by key. Keys of `right` come first in its insertion order,
 * followed by the keys only `left` has, in its order. A key whose value is
 * undefined on both sides is dropped.
 */
export function joinMaps<K, L, R = L>(
  left: ReadonlyMap<K, L>,
  right: ReadonlyMap<K, R>
): JoinedMap<K, L, R> {
  const joined: JoinedMap<K, L, R> = new Map();

  for (const [key, rightValue] of right) {
    const leftValue = left.get(key);
    if (rightValue === undefined && leftValue === undefined) continue;
    joined.set(key, [leftValue, rightValue]);
  }

  for (const [key, leftValue] of left) {
    if (right.has(key) || leftValue === undefined) continue;
    joined.set(key, [leftValue, undefined]);
  }

  return joined;
}
