import { OperationCancelledError, StepTimeoutError } from '../types/orchestration.js';

export interface DeadlineOptions {
  /** Milliseconds before the operation is abandoned; 0 or less disables the timer. */
  timeoutMs?: number;
  /** Outer cancellation, e.g. the owning workflow run. */
  signal?: AbortSignal;
  /** Used in timeout and cancellation messages. */
  label?: string;
}

/**
 * Run an async operation bounded by an optional timeout and abort signal.
 *
 * The operation receives a derived signal that aborts when either bound
 * trips, so cooperative implementations can stop their own work. The returned
 * promise rejects with `StepTimeoutError` or `OperationCancelledError`
 * without waiting for the operation to settle.
 *
 * @example
 * ```ts
 * const action = await withDeadline(
 *   (signal) => agent.decideAction(state, signal),
 *   { timeoutMs: 5_000, signal: run.signal, label: 'fetch-forecast' },
 * );
 * ```
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {},
): Promise<T> {
  const label = options.label ?? 'operation';
  const timeoutMs = options.timeoutMs ?? 0;
  const parent = options.signal;

  if (parent?.aborted) {
    throw new OperationCancelledError(label);
  }

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const guards: Array<Promise<never>> = [];

  if (timeoutMs > 0) {
    guards.push(
      new Promise<never>((_, reject) => {
        const timeoutHandle = setTimeout(() => {
          controller.abort();
          reject(new StepTimeoutError(label, timeoutMs));
        }, timeoutMs);
        cleanups.push(() => clearTimeout(timeoutHandle));
      }),
    );
  }

  if (parent) {
    guards.push(
      new Promise<never>((_, reject) => {
        const onAbort = (): void => {
          controller.abort();
          reject(new OperationCancelledError(label));
        };
        parent.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => parent.removeEventListener('abort', onAbort));
      }),
    );
  }

  try {
    return await Promise.race([operation(controller.signal), ...guards]);
  } finally {
    for (const cleanup of cleanups) {
      cleanup();
    }
  }
}
