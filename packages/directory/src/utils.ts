// Node fires longer timers after 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

export type TimeoutHandle = {
  signal: AbortSignal;
  timedOut: () => boolean;
  cancel: () => void;
};

/**
 * Abort signal that fires after `timeoutMs` or when `parent` aborts, whichever comes first.
 * A missing, zero or negative timeout means no deadline; longer than a timer can hold is clamped.
 */
export const withTimeout = (timeoutMs?: number, parent?: AbortSignal): TimeoutHandle => {
  const controller = new AbortController();
  let expired = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  if (timeoutMs !== undefined && timeoutMs > 0) {
    timer = setTimeout(() => {
      expired = true;
      controller.abort(new Error(`timed out after ${timeoutMs}ms`));
    }, Math.min(timeoutMs, MAX_TIMER_MS));
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    cancel: () => {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
};

/** Strip trailing slashes so a path can be appended to a mirror URL. */
export const joinUrlPath = (base: string, path: string): string => {
  const suffix = path.startsWith('/') ? path : `/${path}`;
  return base.replace(/\/+$/, '') + suffix;
};
