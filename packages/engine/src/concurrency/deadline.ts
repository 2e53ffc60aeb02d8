import { CancelledError } from "../errors";

export type Raced<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "timeout" | "cancelled" };

/**
 * Race a promise against a timeout and an optional abort signal.
 * The losing promise is abandoned, not cancelled; its rejection is observed.
 */
export function raceDeadline<T>(work: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<Raced<T>> {
  if (signal?.aborted) {
    work.catch(() => undefined);
    return Promise.resolve({ ok: false, reason: "cancelled" });
  }

  return new Promise<Raced<T>>((resolve, reject) => {
    let settled = false;
    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      fn();
    };
    const onAbort = () => finish(() => resolve({ ok: false, reason: "cancelled" }));
    const timer = setTimeout(() => finish(() => resolve({ ok: false, reason: "timeout" })), timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => finish(() => resolve({ ok: true, value })),
      (err: unknown) => finish(() => reject(err))
    );
  });
}

/**
 * Throw CancelledError when the signal has fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
