export interface LruCache<V> {
  get: (key: string) => V | undefined;
  set: (key: string, value: V) => void;
  has: (key: string) => boolean;
  keys: () => string[];
  readonly size: number;
}

export function repoPathCacheKey(kind: string, repoFullName: string, filePath: string): string {
  return `${kind}:${repoFullName}:${filePath.replace(/^\/+/, "")}`;
}

/**
 * Bounded cache with least-recently-used eviction. A Map keeps insertion
 * order, so a read re-inserts the key to mark it most recent.
 */
export function createLruCache<V>(maxEntries: number): LruCache<V> {
  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new Error("createLruCache requires maxEntries >= 1");
  }
  const entries = new Map<string, { value: V }>();

  return {
    get(key) {
      const entry = entries.get(key);
      if (!entry) return undefined;
      entries.delete(key);
      entries.set(key, entry);
      return entry.value;
    },
    set(key, value) {
      entries.delete(key);
      entries.set(key, { value });
      while (entries.size > maxEntries) {
        const oldest = entries.keys().next();
        if (oldest.done) break;
        entries.delete(oldest.value);
      }
    },
    has(key) {
      return entries.has(key);
    },
    keys() {
      return [...entries.keys()];
    },
    get size() {
      return entries.size;
    },
  };
}
