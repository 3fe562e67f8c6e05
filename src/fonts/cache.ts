/**
 * Memo Cache
 *
 * Holds a single lazily computed value until it is invalidated.
 * The font catalog lives here: it needs two external commands, so it is
 * built on first use and reused from then on.
 */

export class MemoCache<T> {
  private entry: { value: T } | null = null;

  constructor(private readonly compute: () => T) {}

  /**
   * Return the cached value, computing it on first access.
   * If compute throws, nothing is cached and the next call retries.
   */
  getOrCompute(): T {
    if (this.entry === null) {
      this.entry = { value: this.compute() };
    }
    return this.entry.value;
  }

  /**
   * Drop the cached value; the next getOrCompute() computes it again.
   */
  invalidate(): void {
    this.entry = null;
  }

  get isPopulated(): boolean {
    return this.entry !== null;
  }
}
