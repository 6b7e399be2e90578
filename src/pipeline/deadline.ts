/**
 * Deadline Helpers
 *
 * Bound an async operation by a timeout and/or a caller AbortSignal using
 * the Promise.race pattern. The operation itself is not cancelled; callers
 * are expected to clean up (e.g. roll back) once the race is lost.
 *
 * @module pipeline/deadline
 */

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when an operation loses the race against its deadline.
 */
export class DeadlineExceededError extends Error {
  constructor(
    message: string,
    /** Timeout that fired, when the deadline came from a timer */
    public readonly timeoutMs?: number
  ) {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}

// ============================================================================
// Deadline
// ============================================================================

/**
 * A combined deadline: an internal timer plus an optional caller signal.
 * Call `dispose()` when the guarded work is finished.
 */
export interface Deadline {
  /** Aborts when the timer fires or the caller signal aborts */
  readonly signal: AbortSignal;
  /** Clear the timer and detach from the caller signal */
  dispose(): void;
}

/**
 * Create a deadline from a timeout and an optional caller signal.
 *
 * @param timeoutMs - Milliseconds before the deadline fires (omit for no timer)
 * @param parent - Caller signal; aborting it aborts the deadline
 */
export function createDeadline(timeoutMs?: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    controller.abort(new DeadlineExceededError('Operation aborted by caller'));
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    timeoutId = setTimeout(() => {
      controller.abort(new DeadlineExceededError(`Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose(): void {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Read the DeadlineExceededError an aborted signal carries.
 */
export function deadlineReason(signal: AbortSignal): DeadlineExceededError {
  const reason: unknown = signal.reason;
  return reason instanceof DeadlineExceededError
    ? reason
    : new DeadlineExceededError('Operation aborted');
}

/**
 * Race a promise against a signal.
 *
 * @returns The promise's value if it settles first
 * @throws DeadlineExceededError if the signal aborts first
 *
 * @example
 * ```typescript
 * const deadline = createDeadline(5000, callerSignal);
 * try {
 *   const id = await raceDeadline(tx.write(row), deadline.signal);
 * } finally {
 *   deadline.dispose();
 * }
 * ```
 */
export async function raceDeadline<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep a late rejection of the abandoned promise from going unhandled
    promise.catch(() => undefined);
    throw deadlineReason(signal);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(deadlineReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
