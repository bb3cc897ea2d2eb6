/**
 * Run `fn` with its own abort signal that fires when the caller's signal
 * aborts or when `timeoutMs` elapses. A timeout rejects with `onTimeout()`.
 */
export function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  outer?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
      action();
    };

    const onOuterAbort = () => {
      controller.abort(outer?.reason);
      finish(() => reject(new DOMException('Aborted', 'AbortError')));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(onTimeout()));
    }, timeoutMs);

    if (outer?.aborted) {
      onOuterAbort();
      return;
    }
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }
    pending.then(
      value => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error)),
    );
  });
}
