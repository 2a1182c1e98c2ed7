import { ConnectionError } from "./errors.js";

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  /** Return false to give up immediately on this error. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `operation` up to `retries + 1` times with a linearly growing delay.
 */
export async function retryOperation<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const retries = options.retries ?? 3;
  const delayMs = options.delayMs ?? 300;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= retries || options.shouldRetry?.(error) === false) {
        break;
      }
      options.onRetry?.(error, attempt + 1);
      await sleep(delayMs * (attempt + 1));
    }
  }
  throw lastError;
}

/**
 * `fetch` bounded by a timeout that covers the wait for response headers.
 * Network-level failures (refused, DNS, reset, timeout) surface as
 * ConnectionError; HTTP statuses are left to the caller. Pass a controller to
 * keep the ability to abort the body stream later.
 */
export async function fetchWithTimeout(
  input: string | URL,
  init: RequestInit,
  timeoutMs: number,
  controller: AbortController = new AbortController(),
): Promise<Response> {
  const target = String(input);
  const timer = setTimeout(() => {
    controller.abort(
      new ConnectionError(`Request to ${target} timed out after ${timeoutMs} ms`),
    );
  }, timeoutMs);
  try {
    return await fetch(input, { ...init, signal: controller.signal });
  } catch (error) {
    throw toConnectionError(error, target, timeoutMs);
  } finally {
    clearTimeout(timer);
  }
}

export function toConnectionError(
  error: unknown,
  target: string,
  timeoutMs?: number,
): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  if (isTimeout(error)) {
    const after = timeoutMs === undefined ? "" : ` after ${timeoutMs} ms`;
    return new ConnectionError(`Request to ${target} timed out${after}`, {
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`Request to ${target} failed: ${reason}`, {
    cause: error,
  });
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
