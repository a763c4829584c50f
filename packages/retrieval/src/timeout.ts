/**
 * Deadline wrapper for upstream calls.
 *
 * The call receives an AbortSignal that fires at the deadline. The returned
 * promise never rejects; a late rejection of the abandoned call is absorbed
 * into the settled result.
 */

export type TimedResult<T> =
  | { status: 'done'; value: T }
  | { status: 'error'; error: unknown }
  | { status: 'timeout' };

export async function callWithTimeout<T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<TimedResult<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const call = Promise.resolve()
    .then(() => run(controller.signal))
    .then(
      (value): TimedResult<T> => ({ status: 'done', value }),
      (error: unknown): TimedResult<T> => ({ status: 'error', error })
    );

  const deadline = new Promise<TimedResult<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ status: 'timeout' });
    }, timeoutMs);
  });

  try {
    return await Promise.race([call, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
