/** The error a cancelled wait rejects with: the signal's own reason, or an AbortError. */
export function abortReason(signal?: AbortSignal): Error {
  if (signal?.reason instanceof Error) return signal.reason;
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

/**
 * Resolve after `ms`, or reject with an AbortError as soon as `signal` aborts.
 * The timer is cleared on abort so a cancelled loop leaves nothing pending.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const delay = Math.max(0, ms);
  if (!signal) {
    await new Promise<void>((resolve) => setTimeout(resolve, delay));
    return;
  }

  const sig: AbortSignal = signal;
  if (sig.aborted) throw abortReason(sig);

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(sig));
    };
    const timer = setTimeout(() => {
      sig.removeEventListener("abort", onAbort);
      resolve();
    }, delay);
    sig.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * A signal that aborts after `timeoutMs` or when `parent` aborts, whichever is first.
 * Call `dispose()` once the guarded operation settles.
 */
export function timeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    const err = new Error(`Request timed out after ${timeoutMs}ms`);
    err.name = "TimeoutError";
    controller.abort(err);
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
