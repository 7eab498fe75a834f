/**
 * AggregateLock - per-key serialisation of async work within a process.
 *
 * Each key keeps the tail of a promise chain; `run` appends to it, so
 * callers on the same key execute one after another in arrival order
 * while different keys proceed concurrently.
 *
 * Not reentrant: calling `run` for a key from inside a `run` on the same
 * key waits forever. Nested locks are only ever taken as
 * report → problem or list → problem.
 */
export class AggregateLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
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

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export const lockKeys = {
  report: (reportId: string) => `report:${reportId}`,
  problem: (problemId: string) => `problem:${problemId}`,
  list: (listId: string) => `list:${listId}`,
  acts: (assigneeId: string) => `acts:${assigneeId}`,
};
