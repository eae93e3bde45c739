/**
 * Bounded wait
 *
 * Runs an operation against a deadline. When the budget elapses the signal
 * handed to the operation is aborted and the wait rejects with
 * DeadlineExceededError, whatever the operation is doing.
 *
 * @module utils/deadline
 */

export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export class OperationCancelledError extends Error {
  constructor(reason?: unknown) {
    super(`Operation cancelled${reason instanceof Error ? `: ${reason.message}` : ''}`);
    this.name = 'OperationCancelledError';
  }
}

export interface DeadlineOptions {
  /** Outer cancellation; aborting it ends the wait with OperationCancelledError */
  signal?: AbortSignal;
  /** Receives a rejection the operation produces after the wait already ended */
  onLateRejection?: (error: unknown) => void;
}

export async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: DeadlineOptions = {}
): Promise<T> {
  const parent = options.signal;
  if (parent?.aborted) {
    throw new OperationCancelledError(parent.reason);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const stop = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const error = new OperationCancelledError(parent.reason);
        reject(error);
        controller.abort(error);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  const work = (async () => run(controller.signal))();
  try {
    return await Promise.race([work, stop]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
    if (controller.signal.aborted) {
      const report =
        options.onLateRejection ??
        ((error: unknown) =>
          console.error(
            `[Deadline] Operation rejected after the wait ended: ${error instanceof Error ? error.message : String(error)}`
          ));
      work.then(undefined, report);
    }
  }
}
