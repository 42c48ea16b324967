/**
 * Per-pool action serialisation.
 *
 * Tasks for the same key run one after another in submission order; different
 * keys run independently.
 */

function settle(): undefined {
  return undefined;
}

export class PoolActionQueue {
  private readonly tails = new Map<string, Promise<undefined>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve(undefined);
    const result = previous.then(task);

    // Ordering only: a failed task still rejects `result` for its caller
    const tail = result.then(settle, settle);
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
