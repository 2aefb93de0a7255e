/**
 * Copy-on-write Map helpers.
 *
 * Every function returns a new Map, leaving the original unchanged, so a
 * caller iterating an earlier Map sees a stable snapshot.
 */

export function mapSet<K, V>(map: ReadonlyMap<K, V>, key: K, value: V): ReadonlyMap<K, V> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

export function mapDelete<K, V>(map: ReadonlyMap<K, V>, key: K): ReadonlyMap<K, V> {
  if (!map.has(key)) return map;
  const next = new Map(map);
  next.delete(key);
  return next;
}

/**
 * Add `member` to the set stored under `key`.
 */
export function multiMapAdd<K, M>(
  map: ReadonlyMap<K, ReadonlySet<M>>,
  key: K,
  member: M,
): ReadonlyMap<K, ReadonlySet<M>> {
  const members = new Set(map.get(key));
  members.add(member);
  return mapSet(map, key, members);
}

/**
 * Remove `member` from the set stored under `key`, dropping the key once
 * its set is empty.
 */
export function multiMapRemove<K, M>(
  map: ReadonlyMap<K, ReadonlySet<M>>,
  key: K,
  member: M,
): ReadonlyMap<K, ReadonlySet<M>> {
  const current = map.get(key);
  if (!current?.has(member)) return map;
  if (current.size === 1) return mapDelete(map, key);
  const members = new Set(current);
  members.delete(member);
  return mapSet(map, key, members);
}
