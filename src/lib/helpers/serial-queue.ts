/**
 * Serialized execution queue.
 *
 * Tasks run one at a time in submission order. A rejected task does not
 * break the chain for the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // Keep queue continuity when a task rejects; the caller still sees the rejection.
    this.tail = result.catch(() => undefined);
    return result;
  }
}
