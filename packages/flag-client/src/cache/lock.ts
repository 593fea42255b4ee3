/**
 * Mutual-exclusion lock for async code.
 */
export interface Lock {
  /**
   * Runs a task once every previously queued task has settled.
   * Tasks run one at a time, in the order they were queued.
   * @returns The task's result (or rejection)
   */
  readonly runExclusive: <T>(task: () => T | Promise<T>) => Promise<T>;
}

/**
 * Creates a lock backed by a promise chain.
 *
 * @example
 * ```typescript
 * const lock = createLock();
 * const value = await lock.runExclusive(() => store.get(key));
 * ```
 */
export const createLock = (): Lock => {
  // Always settled successfully, so one failing task never blocks the next
  let tail: Promise<unknown> = Promise.resolve();

  const runExclusive = <T>(task: () => T | Promise<T>): Promise<T> => {
    const run = tail.then(task);
    tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  return { runExclusive };
};
