/** Tracks one pending task per key; later callers for the same key share it. */
export interface InFlightRegistry<T> {
  run(key: string, task: () => Promise<T>): Promise<T>;
  has(key: string): boolean;
  readonly size: number;
}

export class PromiseInFlightRegistry<T> implements InFlightRegistry<T> {
  private readonly pending = new Map<string, Promise<T>>();

  get size(): number {
    return this.pending.size;
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) {
      return existing;
    }
    const promise = task().finally(() => {
      if (this.pending.get(key) === promise) {
        this.pending.delete(key);
      }
    });
    this.pending.set(key, promise);
    return promise;
  }
}
