/**
 * Recipient-side deduplication. Remembers the most recent `capacity` keys and
 * forgets the oldest first.
 */
export class IdempotencyGuard {
  private readonly seen = new Set<string>();
  private readonly capacity: number;

  constructor(capacity = 10_000) {
    this.capacity = capacity;
  }

  /**
   * Record the key. Returns true the first time it is seen, false for repeats.
   */
  claim(key: string): boolean {
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    if (this.seen.size > this.capacity) {
      const oldest = this.seen.values().next();
      if (!oldest.done) {
        this.seen.delete(oldest.value);
      }
    }
    return true;
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  /** Forget a key so a later delivery is processed again (e.g. after a failed apply). */
  forget(key: string): void {
    this.seen.delete(key);
  }

  get size(): number {
    return this.seen.size;
  }
}
