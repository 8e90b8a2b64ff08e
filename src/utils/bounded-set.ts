// ===========================================
// BOUNDED COLLECTIONS
// Approximate LRU: once capacity is exceeded the oldest half
// (by insertion order) is dropped in one go
// ===========================================

export class BoundedSet {
  private items: Set<string> = new Set();

  constructor(private readonly capacity: number) {
    if (capacity < 2) {
      throw new RangeError('BoundedSet capacity must be at least 2');
    }
  }

  has(item: string): boolean {
    return this.items.has(item);
  }

  /**
   * Add an item. Returns false if it was already present.
   */
  add(item: string): boolean {
    if (this.items.has(item)) return false;

    this.items.add(item);
    if (this.items.size > this.capacity) {
      const arr = Array.from(this.items);
      this.items = new Set(arr.slice(arr.length - Math.floor(this.capacity / 2)));
    }
    return true;
  }

  get size(): number {
    return this.items.size;
  }

  clear(): void {
    this.items.clear();
  }
}

export class BoundedMap<V> {
  private entries: Map<string, V> = new Map();

  constructor(private readonly capacity: number) {
    if (capacity < 2) {
      throw new RangeError('BoundedMap capacity must be at least 2');
    }
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Overwrites move the key to the newest position so a frequently
   * re-alerted asset is not evicted first.
   */
  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    if (this.entries.size > this.capacity) {
      const keys = Array.from(this.entries.keys());
      const toDrop = keys.slice(0, keys.length - Math.floor(this.capacity / 2));
      toDrop.forEach(k => this.entries.delete(k));
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
