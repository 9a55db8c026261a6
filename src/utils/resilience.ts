/**
 * Request timeout and retry helpers shared by the routing clients
 */

export interface RetryOptions {
  maxRetries: number;
  retryDelayMs: number;
  label: string;
}

/**
 * Run a task, retrying with linear backoff while isRetryable(error) holds.
 * Attempts run one after another, never concurrently.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt > options.maxRetries || !isRetryable(error)) {
        throw error;
      }

      const waitMs = options.retryDelayMs * attempt;
      console.warn(
        `${options.label} failed (attempt ${attempt}/${options.maxRetries + 1}), retrying in ${waitMs}ms: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }
}

export interface RequestDeadline {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Abort signal that fires after timeoutMs or when the caller's signal fires.
 * dispose() must be called once the request settles.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): RequestDeadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
