// src/lib/singleFlight.ts

/**
 * Lazily initialised handle.
 *
 * The first caller starts `init`; callers arriving while it runs share the same
 * promise, so the resource is built at most once. A failed initialisation is
 * forgotten and the next caller tries again.
 */
export class LazyHandle<T> {
  private pending: Promise<T> | null = null;

  constructor(private readonly init: () => Promise<T>) {}

  get(): Promise<T> {
    if (!this.pending) {
      this.pending = this.init().catch((err: unknown) => {
        this.pending = null;
        throw err;
      });
    }
    return this.pending;
  }

  /**
   * Whether a handle is built or being built
   */
  get started(): boolean {
    return this.pending !== null;
  }
}
