/**
 * Per-request abort handling: a timeout plus the caller's signal.
 * @public
 */
export interface RequestScope {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Opens an abort scope that fires after `timeoutMs` or when the caller's
 * signal aborts, whichever comes first. Call `dispose` once the request
 * settles.
 * @public
 */
export function openRequestScope(
  timeoutMs: number,
  callerSignal?: AbortSignal,
): RequestScope {
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = (): void => controller.abort();
  callerSignal?.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onAbort);
    },
  };
}
