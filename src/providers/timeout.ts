export type TimeoutSignal = {
  signal: AbortSignal;
  cancel: () => void;
  didTimeout: () => boolean;
};

/**
 * Derives a signal that aborts after `timeoutMs` or when the parent aborts,
 * whichever comes first. `cancel` must be called once the guarded call settles.
 */
export const createTimeoutSignal = (timeoutMs: number, parentSignal?: AbortSignal): TimeoutSignal => {
  let timedOut = false;
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | null = null;
  let parentListenerAttached = false;
  const onParentAbort = (): void => {
    controller.abort(parentSignal?.reason);
    cleanup();
  };
  const cleanup = (): void => {
    if (timeout) {
      clearTimeout(timeout);
      timeout = null;
    }
    if (parentSignal && parentListenerAttached) {
      parentSignal.removeEventListener("abort", onParentAbort);
      parentListenerAttached = false;
    }
  };

  if (timeoutMs > 0) {
    timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
      cleanup();
    }, timeoutMs);
  }

  if (parentSignal) {
    if (parentSignal.aborted) {
      controller.abort(parentSignal.reason);
      cleanup();
    } else {
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
      parentListenerAttached = true;
    }
  }

  return {
    signal: controller.signal,
    cancel: cleanup,
    didTimeout: () => timedOut
  };
};
