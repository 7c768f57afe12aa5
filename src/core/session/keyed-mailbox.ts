/**
 * Per-key serial execution.
 *
 * Tasks submitted under the same key run one after another, in submission
 * order, even when they await I/O. Tasks under different keys run
 * independently. A key's chain is dropped once its last task settles.
 */
export class KeyedMailbox<K> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  isBusy(key: K): boolean {
    return this.tails.has(key);
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
