/**
 * Single timestamped value. Reads after `ttlMs` miss; `clear()` forces the
 * next read to miss. Nothing refreshes in the background.
 */
export class TtlCache<T> {
  private entry: { value: T; storedAt: number } | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(): T | null {
    if (!this.entry) {
      return null;
    }

    if (this.now() - this.entry.storedAt >= this.ttlMs) {
      return null;
    }

    return this.entry.value;
  }

  set(value: T): void {
    this.entry = { value, storedAt: this.now() };
  }

  clear(): void {
    this.entry = null;
  }

  async getOrLoad(load: () => Promise<T>): Promise<T> {
    const cached = this.get();
    if (cached !== null) {
      return cached;
    }

    const value = await load();
    this.set(value);
    return value;
  }
}
