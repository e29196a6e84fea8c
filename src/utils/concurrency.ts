/**
 * Runs tasks with at most `concurrency` in flight. Results keep task order.
 * Every task runs even when one fails; the first failure is rethrown once
 * all of them have settled.
 */
export async function runWithConcurrency<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number
): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  const executing: Set<Promise<void>> = new Set();
  const limit = Math.max(1, Math.floor(concurrency));
  const failures: unknown[] = [];

  for (const [index, task] of tasks.entries()) {
    const p: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        (result) => {
          results[index] = result;
        },
        (error: unknown) => {
          failures.push(error);
        }
      )
      .finally(() => {
        executing.delete(p);
      });
    executing.add(p);

    if (executing.size >= limit) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);
  if (failures.length > 0) throw failures[0];
  return results;
}
