const wait = (ms: number, signal?: AbortSignal): Promise<void> => new Promise(resolve => {
  const onAbort = () => {
    clearTimeout(timer);
    resolve();
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort);
    resolve();
  }, ms);

  signal?.addEventListener('abort', onAbort, { once: true });
});

/**
 * A higher-order function that wraps an asynchronous function with retry logic.
 *
 * @param fn The asynchronous function to wrap.
 * @param options Configuration for the retry behavior.
 * @param options.retries The maximum number of retries (default: 3).
 * @param options.delay The initial delay in milliseconds (default: 1000).
 * @param options.backoff The exponential backoff factor (default: 2).
 * @param options.shouldRetry Returns true if the failed call may be attempted again.
 * @param options.label Prefix for the retry log line.
 * @param options.signal Cuts a backoff wait short; the last error is then rethrown.
 * @returns A new function that will retry on failure.
 */
export const withRetry = <A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: {
    retries?: number;
    delay?: number;
    backoff?: number;
    shouldRetry?: (error: unknown) => boolean;
    label?: string;
    signal?: AbortSignal;
  } = {},
) => {
  const {
    retries = 3,
    delay = 1000,
    backoff = 2,
    shouldRetry = () => true,
    label = '[Retry]',
    signal,
  } = options;

  return async (...args: A): Promise<R> => {
    let lastError: unknown;

    for (let i = 0; i <= retries; i++) {
      try {
        return await fn(...args);
      } catch (error) {
        lastError = error;

        if (i < retries && shouldRetry(error)) {
          const jitter = Math.random() * delay * 0.1; // 10% jitter
          const waitTime = delay * Math.pow(backoff, i) + jitter;

          console.log(
            `${label} Attempt ${i + 1} failed. Retrying in ${waitTime.toFixed(0)}ms...`,
          );
          await wait(waitTime, signal);

          if (signal?.aborted) {
            throw error;
          }
        } else {
          throw error;
        }
      }
    }

    // Unreachable; the loop either returns or throws.
    throw lastError;
  };
};
