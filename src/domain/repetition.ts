/**
 * Occurrence counts per position key. One table per game; nothing is shared
 * between games.
 */
export class RepetitionTable {
  private counts = new Map<string, number>();

  increment(key: string): number {
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }

  /**
   * Undo side of `increment`. A key that was never counted means the history
   * and the table disagree, which is a bug in the caller.
   */
  decrement(key: string): number {
    const current = this.counts.get(key);
    if (current === undefined) {
      throw new Error(`Repetition table has no entry for position ${key}`);
    }
    if (current === 1) {
      this.counts.delete(key);
      return 0;
    }
    this.counts.set(key, current - 1);
    return current - 1;
  }

  count(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  /** Number of distinct positions seen. */
  size(): number {
    return this.counts.size;
  }

  clear(): void {
    this.counts.clear();
  }

  /** Copy of the counts, for inspection and tests. */
  snapshot(): Map<string, number> {
    return new Map(this.counts);
  }
}
