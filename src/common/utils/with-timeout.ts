/**
 * Promise timeout helper
 */

export class TimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    context?: string,
  ) {
    super(
      context
        ? `${context} timed out after ${timeoutMs}ms`
        : `Operation timed out after ${timeoutMs}ms`,
    );
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Rejects with TimeoutError when `promise` has not settled within
 * `timeoutMs`. A missing or non-positive timeout returns the promise as-is.
 * The underlying work is abandoned, not cancelled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  context?: string,
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}
