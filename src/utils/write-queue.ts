/**
 * Per-key async mutex using promise chains.
 * Operations enqueued under the same key (a file path) run one after another.
 */
export class WriteQueue {
  private tails = new Map<string, Promise<void>>();

  enqueue<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    // A failed predecessor does not block the next writer
    const run = previous.then(operation);
    this.tails.set(
      key,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );

    return run;
  }

  clear(): void {
    this.tails.clear();
  }
}

let instance: WriteQueue | null = null;

export function getWriteQueue(): WriteQueue {
  if (!instance) {
    instance = new WriteQueue();
  }
  return instance;
}
