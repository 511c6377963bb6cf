/**
 * In-process mutual exclusion keyed by property address. Tasks for the same
 * key run one after another in arrival order; different keys do not wait on
 * each other.
 */
export class AddressLockService {
  private readonly tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public getHeldKeys(): string[] {
    return Array.from(this.tails.keys());
  }
}
