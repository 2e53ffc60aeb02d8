import { raceDeadline } from "../concurrency/deadline";
import { CapabilityUnavailable, CancelledError, errorMessage } from "../errors";

export interface InvokeOptions {
  timeoutMs: number;
  retries: number;
  signal?: AbortSignal;
}

/**
 * Call an external capability with a per-attempt timeout and retries.
 * Cancellation is not retried.
 */
export async function invokeCapability<T>(
  capability: string,
  call: () => Promise<T>,
  opts: InvokeOptions
): Promise<T> {
  let lastError = "no attempt made";

  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      const raced = await raceDeadline(call(), opts.timeoutMs, opts.signal);
      if (raced.ok) return raced.value;
      if (raced.reason === "cancelled") throw new CancelledError(`${capability} call cancelled`);
      lastError = `timed out after ${opts.timeoutMs}ms`;
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      lastError = errorMessage(err);
    }
  }

  throw new CapabilityUnavailable(capability, `${lastError} (${opts.retries + 1} attempt(s))`);
}
