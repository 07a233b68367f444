/**
 * Per-key FIFO mutex.
 *
 * Work submitted under the same key runs one task at a time in submission
 * order; different keys never wait on each other. Idle keys are dropped so
 * the map only holds keys with queued or running work.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 * await mutex.runExclusive(`${itemId}:${userId}`, async () => {
 *   const current = await store.getSchedule(itemId, userId);
 *   await store.putSchedule(next(current), current?.version ?? null);
 * });
 * ```
 */
export class KeyedMutex {
  /** Settles when the last queued task for the key finishes; never rejects */
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
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

  /** Keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
