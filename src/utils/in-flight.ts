// Keyed single-flight: concurrent callers with the same key share one run.
// The entry is dropped once the run settles, so a later call starts fresh.

export class InFlight<T> {
  private runs: Map<string, Promise<T>> = new Map();

  run(key: string, work: () => Promise<T>): Promise<T> {
    const existing = this.runs.get(key);
    if (existing) {
      return existing;
    }
    const promise = work().finally(() => {
      this.runs.delete(key);
    });
    this.runs.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.runs.has(key);
  }

  get size(): number {
    return this.runs.size;
  }
}
