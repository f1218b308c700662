/**
 * Lazily loaded, read-mostly list shared by every handle of a building or
 * database. Reloads are serialized and the new value is swapped in only once
 * it is complete, so readers always see either the old or the new catalog.
 */
export class Catalog<T> {
  private current: Promise<readonly T[]> | null = null;
  private writer: Promise<unknown> = Promise.resolve();

  constructor(private readonly load: (reload: boolean) => Promise<T[]>) {}

  get(): Promise<readonly T[]> {
    if (!this.current) {
      // A failed first load must not stick; the next get() tries again.
      const loading: Promise<readonly T[]> = this.exclusive(() => this.load(false)).catch(
        (err: unknown) => {
          if (this.current === loading) this.current = null;
          throw err;
        }
      );
      this.current = loading;
    }
    return this.current;
  }

  /**
   * Fetches a fresh copy. Readers keep getting the previous value until the
   * new one has fully loaded.
   */
  async reload(): Promise<readonly T[]> {
    const next = await this.exclusive(() => this.load(true));
    this.current = Promise.resolve(next);
    return next;
  }

  invalidate(): void {
    this.current = null;
  }

  get loaded(): boolean {
    return this.current !== null;
  }

  private exclusive<R>(task: () => Promise<R>): Promise<R> {
    const run = this.writer.then(task, task);
    this.writer = run.catch(() => undefined);
    return run;
  }
}
