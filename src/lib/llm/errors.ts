import Anthropic from "@anthropic-ai/sdk";

const RETRYABLE_STATUSES = new Set([400, 408, 409, 429]);

/**
 * Errors worth another attempt: connection failures and timeouts, rate
 * limiting, overload and other 5xx responses, and request rejections.
 */
export function isTransientLlmError(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionError) return true;
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (typeof status !== "number") return false;
    return RETRYABLE_STATUSES.has(status) || status >= 500;
  }
  return false;
}
