import { ProviderTimeoutError } from "../../domain/errors/pipeline.errors";

/**
 * Runs tasks with at most `workers` in flight. Results keep task order
 * regardless of completion order. A rejected task rejects the whole run.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: (completed: number, total: number) => void
): Promise<T[]> {
  const total = tasks.length;
  const results: T[] = new Array(total);
  let nextIndex = 0;
  let completed = 0;

  const worker = async () => {
    while (true) {
      const current = nextIndex;
      if (current >= total) {
        return;
      }
      nextIndex += 1;
      results[current] = await tasks[current]();
      completed += 1;
      onProgress?.(completed, total);
    }
  };

  const count = Math.max(1, Math.min(workers, total));
  await Promise.all(Array.from({ length: count }, () => worker()));
  return results;
}

/**
 * Bounds an operation in time. On expiry the operation's signal is aborted
 * and the returned promise rejects with ProviderTimeoutError.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ProviderTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  return Promise.race([operation(controller.signal), timeout]).finally(() => clearTimeout(timer));
}
