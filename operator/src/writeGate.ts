/**
 * Serializes async tasks that share one writer. Tasks run one at a time in
 * call order; a rejected task only fails its own caller.
 */
export class WriteGate {
  private tail: Promise<unknown> = Promise.resolve();
  private waiting = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this.waiting;
  }

  /** Resolves once every task queued so far has settled. */
  idle(): Promise<void> {
    return this.tail.then(() => undefined);
  }

  private release(): void {
    this.waiting -= 1;
  }
}
