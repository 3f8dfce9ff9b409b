export type WaitResult<T> =
  | { ok: true; value: T; elapsedMs: number }
  | { ok: false; reason: 'timeout' | 'aborted'; elapsedMs: number };

export interface WaitOptions {
  timeoutMs: number;
  intervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Resolves once `predicate` returns something other than `undefined`, `null`
 * or `false`, or when the deadline passes. Predicate errors count as "not yet".
 */
export async function waitUntil<T>(
  predicate: () => Promise<T | null | undefined | false> | T | null | undefined | false,
  { timeoutMs, intervalMs = 250, signal }: WaitOptions,
): Promise<WaitResult<T>> {
  const startedAt = Date.now();

  for (;;) {
    if (signal?.aborted) {
      return { ok: false, reason: 'aborted', elapsedMs: Date.now() - startedAt };
    }

    let value: T | null | undefined | false;
    try {
      value = await predicate();
    } catch {
      value = undefined;
    }
    if (value !== undefined && value !== null && value !== false) {
      return { ok: true, value, elapsedMs: Date.now() - startedAt };
    }

    const remaining = timeoutMs - (Date.now() - startedAt);
    if (remaining <= 0) {
      return { ok: false, reason: 'timeout', elapsedMs: Date.now() - startedAt };
    }
    const slept = await sleep(Math.min(intervalMs, remaining), signal);
    if (!slept) {
      return { ok: false, reason: 'aborted', elapsedMs: Date.now() - startedAt };
    }
  }
}

/** Resolves `true` after `ms`, or `false` as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  if (ms <= 0) {
    return Promise.resolve(true);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `operation` against a hard deadline. The deadline wins with `onTimeout()`'s error;
 * the controller handed to the operation is aborted either way so it can stop work.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', forwardAbort);
    if (!controller.signal.aborted) {
      controller.abort();
    }
  }
}

export function randomBetween(min: number, max: number): number {
  if (max <= min) return min;
  return Math.floor(min + Math.random() * (max - min));
}
