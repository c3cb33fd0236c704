import { randomUUID } from 'node:crypto';

/** Collision-resistant tool call id: `call_` + 24 hex chars of a v4 UUID. */
export function generateCallId(): string {
  return `call_${randomUUID().replace(/-/g, '').slice(0, 24)}`;
}

/** Type guard: checks that a value is a non-null, non-array object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve or reject with `promise`, or reject with `onAbort()` as soon as
 * `signal` fires. The abort listener is removed once settled.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  onAbort: () => unknown,
): Promise<T> {
  if (signal.aborted) return Promise.reject(onAbort());

  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort());
    signal.addEventListener('abort', abort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', abort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', abort);
        reject(err);
      },
    );
  });
}

/** Wait `ms`, rejecting with `onAbort()` if the signal fires first. */
export function sleep(ms: number, signal: AbortSignal, onAbort: () => unknown): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const wait = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return raceAbort(wait, signal, onAbort).finally(() => clearTimeout(timer));
}

/**
 * Controller that aborts when any parent aborts, or after `timeoutMs`.
 * Call `dispose()` to release listeners and the timer.
 */
export function linkSignals(
  parents: readonly (AbortSignal | undefined)[],
  timeoutMs?: number,
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: (() => void)[] = [];
  let timedOut = false;

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const forward = () => controller.abort(parent.reason);
    parent.addEventListener('abort', forward, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', forward));
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
      cleanups.length = 0;
    },
  };
}
