export class TimeoutError extends Error {
  constructor(public readonly ms: number, message?: string) {
    super(message ?? `Operation timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `fn` with an AbortSignal that fires after `ms`. Rejects with
 * TimeoutError when the deadline passes first; the signal lets the callee
 * stop its own work. An already-aborted `parent` signal aborts immediately.
 * The timer is cleared however `fn` settles, including a synchronous throw.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = (): void => {
      clearTimeout(timer);
      controller.abort(parent?.reason);
      reject(new TimeoutError(ms, 'Operation aborted'));
    };

    const timer = setTimeout(() => {
      parent?.removeEventListener('abort', onParentAbort);
      const error = new TimeoutError(ms);
      controller.abort(error);
      reject(error);
    }, ms);

    if (parent) {
      if (parent.aborted) {
        onParentAbort();
        return;
      }
      parent.addEventListener('abort', onParentAbort, { once: true });
    }

    const settle = (): void => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (err) {
      settle();
      reject(err);
      return;
    }

    pending
      .then(value => {
        settle();
        resolve(value);
      })
      .catch((err: unknown) => {
        settle();
        reject(err);
      });
  });
}
