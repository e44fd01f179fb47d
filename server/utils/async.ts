export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export type Sleep = (ms: number) => Promise<void>;

/**
 * Resolves to the task's value, or to `fallback` when it rejects. The error is
 * handed to `onError` first.
 */
export const settleWith = async <T>(
  task: () => Promise<T>,
  fallback: () => T,
  onError: (error: unknown) => void,
): Promise<T> => {
  try {
    return await task();
  } catch (error) {
    onError(error);
    return fallback();
  }
};
