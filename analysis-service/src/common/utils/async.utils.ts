/**
 * Sleep helper for retry backoff
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TimeoutError extends Error {
  constructor(
    label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer. The timer is always cleared so an
 * abandoned call never keeps the process alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    timer.unref();
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface ClosableResponse {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that aborts when the connection closes before the response was sent
 */
export function abortSignalOnClose(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();

  res.once('close', () => {
    if (!res.writableEnded) {
      controller.abort(new Error('Client closed the connection'));
    }
  });

  return controller.signal;
}
