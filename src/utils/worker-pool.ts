/**
 * Worker Pool
 *
 * N workers pull tasks from a shared queue. Results come back in task
 * order; a failing task is recorded and the remaining ones still run.
 */

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>;

export interface WorkerPoolOptions<R> {
  /** Number of concurrent workers (default 2) */
  concurrency?: number;
  /** Called after each task finishes, successfully or not */
  onSettled?: (info: { index: number; completed: number; total: number; result?: R; error?: Error }) => void | Promise<void>;
}

export interface WorkerPoolResult<R> {
  /** Results in original task order (undefined for failed tasks) */
  results: Array<R | undefined>;
  errors: Array<{ index: number; error: Error }>;
}

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<R> = {}
): Promise<WorkerPoolResult<R>> {
  const results: Array<R | undefined> = new Array<R | undefined>(tasks.length).fill(undefined);
  const errors: Array<{ index: number; error: Error }> = [];

  if (tasks.length === 0) {
    return { results, errors };
  }

  const concurrency = Math.max(1, options.concurrency ?? 2);
  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      const task = tasks[index];

      let result: R | undefined;
      let error: Error | undefined;

      try {
        result = await processor(task, index);
        results[index] = result;
      } catch (e) {
        error = e instanceof Error ? e : new Error(String(e));
        errors.push({ index, error });
      }

      completed++;
      await options.onSettled?.({ index, completed, total: tasks.length, result, error });
    }
  }

  const workerCount = Math.min(concurrency, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  errors.sort((a, b) => a.index - b.index);
  return { results, errors };
}
