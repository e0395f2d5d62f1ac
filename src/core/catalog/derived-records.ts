/**
 * Memoised derived records (nodes, role links, entity sets), kept in the
 * order they were first resolved.
 */
export class DerivedRecords<T> implements Iterable<[identifier: string, record: T]> {
  private readonly records = new Map<string, T>();
  private hitCount = 0;

  /**
   * Return the cached record for `identifier`, building it on first use.
   * A build that throws caches nothing.
   */
  resolve(identifier: string, build: (identifier: string) => T): T {
    const cached = this.records.get(identifier);
    if (cached !== undefined) {
      this.hitCount++;
      return cached;
    }
    const record = build(identifier);
    this.records.set(identifier, record);
    return record;
  }

  get(identifier: string): T | undefined {
    return this.records.get(identifier);
  }

  has(identifier: string): boolean {
    return this.records.has(identifier);
  }

  get size(): number {
    return this.records.size;
  }

  /** Number of lookups answered from the cache */
  get hits(): number {
    return this.hitCount;
  }

  [Symbol.iterator](): Iterator<[string, T]> {
    return this.records.entries();
  }
}
