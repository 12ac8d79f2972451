/**
 * Scoped deadlines and cooperative cancellation.
 *
 * Two flavours of deadline are used throughout the orchestrator:
 *
 * - `moveOnAfter`: expiry is a normal outcome. The scope's signal is aborted,
 *   the body is awaited until it has fully unwound, and the caller is told
 *   whether it completed. Used to bound workload windows.
 * - `failAfter` / `withTimeout`: expiry is an error. Used for individual poll
 *   attempts and for top-level waits.
 */

import { DeadlineExceededError } from './errors.js';

/**
 * Outcome of a `moveOnAfter` scope.
 */
export type ScopeResult<T> =
  | { readonly completed: true; readonly value: T }
  | { readonly completed: false };

/**
 * Sleeps for `ms` milliseconds. Resolves early, without error, when `signal`
 * is aborted.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Creates a child controller that is aborted when `parent` is.
 * Returns a disposer that detaches it from the parent.
 */
export function linkedController(parent?: AbortSignal): {
  readonly controller: AbortController;
  readonly dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}

/**
 * Whether an error is the result of the given signal being aborted.
 */
export function isAbortError(error: unknown, signal: AbortSignal): boolean {
  if (!signal.aborted) return false;
  if (error === signal.reason) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Runs `body` and aborts its signal after `timeoutMs`. Expiry is not an
 * error: the scope waits for the body to finish unwinding and reports
 * `{ completed: false }`. Errors raised by the body before expiry, and errors
 * unrelated to the abort, propagate.
 *
 * @example
 * ```typescript
 * const outcome = await moveOnAfter(1000, (signal) => sendWrites(signal));
 * if (!outcome.completed) {
 *   // window closed, all writes have settled
 * }
 * ```
 */
export async function moveOnAfter<T>(
  timeoutMs: number,
  body: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<ScopeResult<T>> {
  const { controller, dispose } = linkedController(parent);
  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);

  try {
    const value = await body(controller.signal);
    if (controller.signal.aborted) {
      return { completed: false };
    }
    return { completed: true, value };
  } catch (error) {
    if (isAbortError(error, controller.signal)) {
      return { completed: false };
    }
    throw error;
  } finally {
    clearTimeout(timer);
    dispose();
  }
}

/**
 * Runs `body` and rejects with the error produced by `onTimeout` if it does
 * not settle within `timeoutMs`. The body's signal is aborted on timeout; the
 * body itself is not awaited past that point.
 */
export function withTimeout<T>(
  timeoutMs: number,
  body: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
  parent?: AbortSignal,
): Promise<T> {
  const { controller, dispose } = linkedController(parent);

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      const error = onTimeout();
      controller.abort(error);
      dispose();
      reject(error);
    }, timeoutMs);

    body(controller.signal).then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        dispose();
        resolve(value);
      },
      (error: unknown) => {
        // A body that fails after its timeout fired has already been reported.
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        dispose();
        reject(error);
      },
    );
  });
}

/**
 * Runs `body`, rejecting with `DeadlineExceededError` after `timeoutMs`.
 */
export function failAfter<T>(
  timeoutMs: number,
  body: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  return withTimeout(timeoutMs, body, () => new DeadlineExceededError(timeoutMs), parent);
}
