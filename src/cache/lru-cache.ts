export const DEFAULT_MAX_ENTRIES = 256;

const normalizeMaxEntries = (value: number | undefined): number => (
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.trunc(value) : DEFAULT_MAX_ENTRIES
);

// Map iteration order doubles as recency order: oldest first.
// Values must not be undefined; a stored undefined reads as a miss.
export class LruCache<K, V> {
  private readonly entries = new Map<K, V>();
  private readonly maxEntries: number;

  constructor(maxEntries?: number) {
    this.maxEntries = normalizeMaxEntries(maxEntries);
  }

  get size(): number {
    return this.entries.size;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) this.entries.delete(key);
    this.entries.set(key, value);
    const overflow = this.entries.size - this.maxEntries;
    if (overflow <= 0) return;
    const victims = [...this.entries.keys()].slice(0, overflow);
    victims.forEach((victim) => {
      this.entries.delete(victim);
    });
  }

  clear(): void {
    this.entries.clear();
  }
}
