/**
 * Bounded set of recently seen keys. The oldest key is forgotten first.
 */
export class RecentKeys {
  private readonly buffer: Array<string | undefined>;
  private readonly set = new Set<string>();
  private index = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<string | undefined>(capacity).fill(undefined);
  }

  has(key: string): boolean {
    return this.set.has(key);
  }

  /** Records `key`; returns false if it was already present. */
  add(key: string): boolean {
    if (this.set.has(key)) return false;

    const evicted = this.buffer[this.index];
    if (evicted !== undefined) this.set.delete(evicted);

    this.buffer[this.index] = key;
    this.set.add(key);
    this.index = (this.index + 1) % this.capacity;
    return true;
  }

  get size(): number {
    return this.set.size;
  }
}
