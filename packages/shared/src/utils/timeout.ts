import { ModalityTimeoutError } from './errors.js';

/**
 * Runs `operation` with an AbortSignal that fires after `timeoutMs`.
 * The returned promise rejects with a ModalityTimeoutError at that point,
 * whether or not the operation honours the signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new ModalityTimeoutError(
        `${label} timed out after ${String(timeoutMs)}ms`,
        timeoutMs,
      );
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
