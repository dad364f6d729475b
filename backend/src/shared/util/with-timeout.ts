/**
 * backend/src/shared/util/with-timeout.ts
 *
 * Races `promise` against a timer. On timeout the error from `onTimeout` is thrown;
 * the underlying operation is not cancelled, its late result is ignored.
 */

export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
