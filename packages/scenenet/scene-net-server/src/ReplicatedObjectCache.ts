export type DisposableObject = {
  dispose(): void;
};

/**
 * Keeps one replicated object per source key, so a source shared by many entities (a mesh, a
 * texture) is published once. Entries live until they are invalidated or the cache is cleared;
 * both dispose the object.
 */
export class ReplicatedObjectCache<K, V extends DisposableObject> {
  private entries = new Map<K, V>();

  public get size(): number {
    return this.entries.size;
  }

  public getOrCreate(key: K, factory: (key: K) => V): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const created = factory(key);
    this.entries.set(key, created);
    return created;
  }

  public get(key: K): V | null {
    return this.entries.get(key) ?? null;
  }

  public invalidate(key: K): boolean {
    const existing = this.entries.get(key);
    if (existing === undefined) {
      return false;
    }
    this.entries.delete(key);
    existing.dispose();
    return true;
  }

  public clear(): void {
    const entries = Array.from(this.entries.values());
    this.entries.clear();
    for (const entry of entries) {
      entry.dispose();
    }
  }
}
