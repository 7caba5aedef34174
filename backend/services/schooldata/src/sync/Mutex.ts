// backend/services/schooldata/src/sync/Mutex.ts
/**
 * Promise-chain mutex: critical sections run one at a time in call order.
 * A failing section does not poison the chain.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
