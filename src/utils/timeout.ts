import { BackendTimeoutError } from "./errors.js";

/**
 * Run `task` with an abort signal that fires after `timeoutMs`.
 * Rejects with BackendTimeoutError when the timer wins; the timer is always cleared.
 * An outer `signal` (caller cancellation) is forwarded to the task.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const forwardAbort = (): void => controller.abort(signal?.reason);
  if (signal) {
    if (signal.aborted) controller.abort(signal.reason);
    else signal.addEventListener("abort", forwardAbort, { once: true });
  }

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new BackendTimeoutError(
        `${label} did not respond within ${timeoutMs}ms`,
        timeoutMs,
      );
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

/** True for the error shapes fetch and AbortController produce on abort. */
export function isAbortError(err: unknown): boolean {
  if (err instanceof BackendTimeoutError) return true;
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
