export class OperationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OperationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class OperationAbortedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OperationAbortedError";
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface WithTimeoutOptions {
  timeoutMs: number;
  label: string;
  /** Caller-owned signal, e.g. aborted when the HTTP client disconnects. */
  signal?: AbortSignal;
}

/**
 * Runs `operation` with a signal that aborts after `timeoutMs` or when the
 * caller's signal aborts, whichever comes first. The returned promise settles
 * at that moment even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: WithTimeoutOptions
): Promise<T> {
  if (options.signal?.aborted) {
    throw new OperationAbortedError(`${options.label} was aborted before it started`);
  }

  const controller = new AbortController();
  let timedOut = false;
  let rejectOnAbort: (reason: Error) => void = () => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectOnAbort = reject;
  });

  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    controller.abort();
    rejectOnAbort(new Error(`${options.label} deadline reached`));
  }, options.timeoutMs);
  const onCallerAbort = (): void => {
    controller.abort();
    rejectOnAbort(new Error(`${options.label} aborted by caller`));
  };
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } catch (error) {
    if (timedOut) {
      throw new OperationTimeoutError(`${options.label} timed out after ${options.timeoutMs}ms`, options.timeoutMs, {
        cause: error
      });
    }
    if (options.signal?.aborted) {
      throw new OperationAbortedError(`${options.label} was aborted`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
    options.signal?.removeEventListener("abort", onCallerAbort);
  }
}

export interface WithRetriesOptions {
  /** Extra attempts after the first one. */
  retries: number;
  retryDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export async function withRetries<T>(
  operation: (attempt: number) => Promise<T>,
  options: WithRetriesOptions
): Promise<T> {
  const sleep = options.sleep ?? delay;
  const maxAttempts = Math.max(1, options.retries + 1);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(options.retryDelayMs * attempt);
    }
  }
}
