/**
 * Promise-chain mutex. Tasks run one at a time in submission order; a failing task
 * rejects its own caller and does not block the ones queued after it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
