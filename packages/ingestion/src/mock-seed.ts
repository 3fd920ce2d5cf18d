export function hashCode(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash + char) | 0;
  }
  return hash;
}

/** Picks an item from `items` that is stable for a given key. */
export function pickBySeed<T>(items: readonly T[], key: string): T {
  return items[Math.abs(hashCode(key)) % items.length];
}
