/**
 * Per-key serial execution
 *
 * Calls sharing a key run one at a time, in arrival order, each to
 * completion before the next starts. Calls on different keys do not wait
 * for each other. A failed call does not block the ones queued after it.
 */
export class CallQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, call: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(call);

    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);

    return result;
  }

  /** Resolves once every call queued so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
