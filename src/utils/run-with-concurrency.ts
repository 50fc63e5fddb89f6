/**
 * Run tasks with at most `concurrency` in flight. Results keep task order.
 */
export const runWithConcurrency = async <T>(
  tasks: Array<() => Promise<T>>,
  concurrency: number,
): Promise<T[]> => {
  const results: T[] = new Array(tasks.length);
  let index = 0;

  const workerCount = Math.min(Math.max(1, concurrency), tasks.length);
  const workers = Array.from({ length: workerCount }, async () => {
    while (index < tasks.length) {
      const current = index;
      index += 1;
      const task = tasks[current];
      if (!task) {
        break;
      }
      results[current] = await task();
    }
  });

  await Promise.all(workers);
  return results;
};

export const sleep = (milliseconds: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, milliseconds));

/** Doubling delay for the given 1-based attempt, capped at `maxMs`. */
export const backoffDelay = (attempt: number, baseMs: number, maxMs: number): number =>
  Math.min(baseMs * 2 ** Math.max(0, attempt - 1), maxMs);
