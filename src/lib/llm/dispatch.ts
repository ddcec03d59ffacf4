import type { DispatchStats } from "../types";
import type { RateLimiter } from "./rate-limiter";
import { withRetry } from "./retry";

export interface DispatchTask<T> {
  key: string;
  run: (attempt: number) => Promise<T>;
}

export interface DispatchOptions<T> {
  limiter: RateLimiter;
  maxAttempts: number;
  baseDelayMs: number;
  isTransient: (error: unknown) => boolean;
  label: string;
  /** Result recorded for a task that failed for good */
  fallback: (key: string) => T;
  /** Called as each task settles, in completion order */
  onSettled?: (key: string, result: T) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Start every task at once and wait for all of them. Each attempt of a task
 * waits for a limiter permit first, so the limiter paces call starts across
 * the whole batch while backoff sleeps only hold up the task that failed.
 * Results are keyed by task key; completion order carries no meaning.
 */
export async function dispatchAll<T>(
  tasks: DispatchTask<T>[],
  options: DispatchOptions<T>
): Promise<{ results: Map<string, T>; stats: DispatchStats }> {
  const results = new Map<string, T>();
  const stats: DispatchStats = {
    dispatched: tasks.length,
    succeeded: 0,
    exhausted: 0,
    failed: 0,
    attempts: 0,
  };

  await Promise.all(
    tasks.map(async (task) => {
      const outcome = await withRetry(
        async (attempt) => {
          await options.limiter.acquire();
          return task.run(attempt);
        },
        {
          maxAttempts: options.maxAttempts,
          baseDelayMs: options.baseDelayMs,
          isTransient: options.isTransient,
          label: `${options.label}:${task.key}`,
          sleep: options.sleep,
        }
      );

      stats.attempts += outcome.attempts;
      let result: T;
      if (outcome.ok) {
        stats.succeeded++;
        result = outcome.value;
      } else {
        if (outcome.reason === "exhausted") stats.exhausted++;
        else stats.failed++;
        result = options.fallback(task.key);
      }

      results.set(task.key, result);
      options.onSettled?.(task.key, result);
    })
  );

  return { results, stats };
}
