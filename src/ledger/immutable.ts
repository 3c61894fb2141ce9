// Copy-on-write helpers; ledger state is swapped wholesale so a failed
// operation can be undone by restoring the previous reference.

export function withEntry<K, V>(map: ReadonlyMap<K, V>, key: K, value: V): ReadonlyMap<K, V> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

export function withMember<T>(set: ReadonlySet<T>, member: T): ReadonlySet<T> {
  const next = new Set(set);
  next.add(member);
  return next;
}
