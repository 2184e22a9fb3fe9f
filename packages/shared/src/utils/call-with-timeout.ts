import { delay } from 'es-toolkit';

import { GenerationTimeoutError } from './generation-errors';

/**
 * Run an abortable async operation with a time budget.
 *
 * The operation receives a signal that aborts when the budget is spent, when
 * `parentSignal` aborts, or once the call has settled. The timer is always
 * cleared, so nothing is left pending after the call returns.
 *
 * @param run - Operation to run; should honour the given signal
 * @param timeoutMs - Time budget in milliseconds
 * @param parentSignal - Optional outer cancellation
 * @throws GenerationTimeoutError when the budget is spent first
 */
export async function callWithTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw parentSignal.reason;
  }

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  const timer = delay(timeoutMs, { signal: controller.signal }).then(
    (): never => {
      const error = new GenerationTimeoutError(timeoutMs);
      controller.abort(error);
      throw error;
    },
  );

  try {
    return await Promise.race([run(controller.signal), timer]);
  } finally {
    controller.abort();
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
