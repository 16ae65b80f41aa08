/**
 * Why a cancellation fired: the caller aborted, or a derived timeout elapsed
 */
export type CancellationReason = 'aborted' | 'timeout';

/**
 * Error used as the abort reason for every signal created here
 */
export class CancelledError extends Error {
  readonly reason: CancellationReason;

  constructor(reason: CancellationReason, message?: string) {
    super(message ?? (reason === 'timeout' ? 'Operation timed out' : 'Operation was cancelled'));
    this.name = 'CancelledError';
    this.reason = reason;
  }
}

/**
 * Handle for a signal derived from a parent signal and/or a timeout
 */
export interface DerivedSignal {
  signal: AbortSignal;
  /** Detaches from the parent and clears the timer. Safe to call more than once. */
  dispose(): void;
}

/**
 * Returns the signal's reason as a CancelledError, wrapping foreign reasons
 */
export function cancellationReason(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  if (reason instanceof Error && reason.name !== 'AbortError') {
    return new CancelledError('aborted', reason.message);
  }
  return new CancelledError('aborted');
}

/**
 * Derives a child signal that aborts when the parent aborts or when
 * `timeoutMs` elapses, whichever happens first.
 */
export function deriveSignal(parent?: AbortSignal, timeoutMs?: number): DerivedSignal {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    if (parent) {
      controller.abort(cancellationReason(parent));
    }
  };

  const dispose = (): void => {
    if (timer !== undefined) {
      clearTimeout(timer);
      timer = undefined;
    }
    parent?.removeEventListener('abort', onParentAbort);
  };

  if (parent?.aborted) {
    controller.abort(cancellationReason(parent));
    return { signal: controller.signal, dispose };
  }

  parent?.addEventListener('abort', onParentAbort, { once: true });

  if (timeoutMs !== undefined) {
    timer = setTimeout(() => {
      controller.abort(new CancelledError('timeout', `Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  return { signal: controller.signal, dispose };
}

/**
 * Settles with the promise, or rejects with the cancellation reason as soon as
 * the signal aborts. A late rejection from the losing promise is absorbed.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(cancellationReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(cancellationReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Resolves after `ms`, or rejects with the cancellation reason if the signal aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(cancellationReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
