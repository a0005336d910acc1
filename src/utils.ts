import { AbortedError, TimeoutError, type ErrorComponent } from './errors.js';

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  component: ErrorComponent = 'runner',
  signal?: AbortSignal,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError(`${label} aborted`, { component, operation: label }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(
        new TimeoutError(`${label} timed out after ${ms}ms`, {
          component,
          operation: label,
          timeoutMs: ms,
        }),
      );
    }, ms);

    promise.then(
      value => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      },
    );

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
