import { delay, errorMessage } from "../utils";

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: "exhausted" | "unexpected"; error: unknown; attempts: number };

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  isTransient: (error: unknown) => boolean;
  label: string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run an operation, retrying transient failures with exponential backoff
 * (baseDelayMs, 2x, 4x, ...). Never throws: exhausted retries and
 * unclassified errors come back as { ok: false }.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const { maxAttempts, baseDelayMs, isTransient, label } = options;
  const sleep = options.sleep ?? delay;
  let lastError: unknown = new Error(`[${label}] maxAttempts must be at least 1`);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (!isTransient(error)) {
        console.error(`[${label}] Unexpected error: ${errorMessage(error)}`);
        return { ok: false, reason: "unexpected", error, attempts: attempt };
      }

      lastError = error;
      console.warn(`[${label}] API error on attempt ${attempt}/${maxAttempts}: ${errorMessage(error)}`);

      if (attempt < maxAttempts) {
        const waitMs = baseDelayMs * Math.pow(2, attempt - 1);
        console.log(`[${label}] Retrying in ${waitMs}ms...`);
        await sleep(waitMs);
      }
    }
  }

  console.error(`[${label}] Failed after ${maxAttempts} attempts`);
  return { ok: false, reason: "exhausted", error: lastError, attempts: Math.max(0, maxAttempts) };
}
