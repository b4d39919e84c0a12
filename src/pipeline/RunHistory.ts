/**
 * Bounded history of the most recent runs (oldest evicted first)
 */
export class RunHistory<T> {
  private readonly buffer: T[] = [];

  constructor(public readonly capacity: number = 10) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(run: T): void {
    this.buffer.push(run);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }
  }

  /**
   * Runs from oldest to newest, optionally only the `limit` newest
   */
  list(limit?: number): T[] {
    if (limit === undefined) {
      return [...this.buffer];
    }
    return limit <= 0 ? [] : this.buffer.slice(-limit);
  }

  latest(): T | undefined {
    return this.buffer[this.buffer.length - 1];
  }

  clear(): void {
    this.buffer.length = 0;
  }

  get size(): number {
    return this.buffer.length;
  }
}
