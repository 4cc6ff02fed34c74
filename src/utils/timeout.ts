import { TimeoutError } from './errorHandler';

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs` or when `parent` aborts.
 * Rejects with TimeoutError on the deadline; the timer never outlives the call.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      const error = new TimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(operation, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export interface Deadline {
  signal: AbortSignal;
  readonly timedOut: boolean;
  clear(): void;
}

/**
 * AbortSignal that fires with a TimeoutError after `timeoutMs` or with the parent's reason.
 * Call clear() once the guarded work settles.
 */
export function createDeadline(operation: string, timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new TimeoutError(operation, timeoutMs));
  }, timeoutMs);

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    clear() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
