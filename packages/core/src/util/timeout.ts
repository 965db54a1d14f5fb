/**
 * Run an async operation under a deadline.
 *
 * On expiry the signal handed to the operation is aborted and the returned
 * promise rejects with the error from onTimeout, whether or not the operation
 * honours the signal. The timer is always cleared.
 */
export async function withTimeout<T>(
  ms: number,
  run: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the deadline error wins the race.
      reject(onTimeout());
      controller.abort();
    }, ms);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
