/**
 * ConvergencePoller - bounded retry loops over live cluster state.
 *
 * A wait repeatedly runs a query under a per-attempt timeout until a
 * predicate holds on its result. Attempt timeouts and transient observation
 * errors mean "not converged yet"; only the expiry of the overall deadline is
 * reported, as `ConvergenceTimeoutError`. Errors that are not retryable
 * propagate on the first occurrence.
 *
 * @example
 * ```typescript
 * const view = await ConvergencePoller.waitForView(cluster, 2, (v) => v === 1, {
 *   message: 'Make sure view change has been triggered',
 * });
 *
 * await ConvergencePoller.retryUntil((signal) => tracker.trackedReadYourWrites(signal), {
 *   deadlineMs: 60000,
 *   perPollTimeoutMs: 5000,
 * });
 * ```
 */

import type { ClusterController } from '../cluster/types.js';
import { ConvergenceTimeoutError, PollAttemptTimeoutError, isTransientError, toError } from '../core/errors.js';
import { delay, withTimeout } from '../core/deadline.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { DEFAULTS, type ReplicaId, type ViewNumber, type ViewPredicate } from '../core/types.js';
import type { ViewObserver } from './view-observer.js';

/**
 * Options for a convergence wait.
 */
export interface PollOptions<T> {
  /** Timeout of a single query attempt. Default: 5000. */
  readonly perPollTimeoutMs?: number;
  /** Overall deadline of the wait. Default: 30000. */
  readonly deadlineMs?: number;
  /** Fixed pause between attempts. Default: 100. */
  readonly intervalMs?: number;
  /** Context included in the timeout error. */
  readonly message?: string;
  /** Cancels the wait; the abort reason is rethrown. */
  readonly signal?: AbortSignal;
  /**
   * Decides which query errors are retried.
   * Default: transient observation errors and attempt timeouts.
   */
  readonly isRetryable?: (error: unknown) => boolean;
  /** Called with every value the query returns. */
  readonly onObservation?: (value: T) => void;
  readonly logger?: Logger;
}

/**
 * Options for view waits.
 */
export interface ViewWaitOptions extends PollOptions<ViewNumber> {
  /** Records every observed view for monotonicity checks. */
  readonly observer?: ViewObserver;
}

/**
 * Query run by a wait. The signal is aborted when the attempt times out.
 */
export type PollQuery<T> = (signal: AbortSignal) => Promise<T>;

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Wait was cancelled');
}

/**
 * Polls `query` until `predicate` holds on its result.
 *
 * @returns The first value satisfying the predicate
 * @throws {ConvergenceTimeoutError} If the overall deadline elapses first
 */
async function waitFor<T>(
  predicate: (value: T) => boolean,
  query: PollQuery<T>,
  options: PollOptions<T> = {},
): Promise<T> {
  const {
    perPollTimeoutMs = DEFAULTS.PER_POLL_TIMEOUT_MS,
    deadlineMs = DEFAULTS.VIEW_WAIT_DEADLINE_MS,
    intervalMs = DEFAULTS.STATUS_POLL_INTERVAL_MS,
    message = 'Timeout waiting for convergence',
    signal,
    isRetryable = isTransientError,
    onObservation,
    logger = silentLogger(),
  } = options;

  const deadline = Date.now() + deadlineMs;
  let attempts = 0;
  let lastObserved: T | undefined;
  let lastError: Error | undefined;

  for (;;) {
    if (signal?.aborted) {
      throw abortError(signal);
    }

    attempts++;
    const attemptTimeoutMs = Math.max(1, Math.min(perPollTimeoutMs, deadline - Date.now()));

    try {
      const value = await withTimeout(
        attemptTimeoutMs,
        query,
        () => new PollAttemptTimeoutError(attemptTimeoutMs),
        signal,
      );
      lastObserved = value;
      onObservation?.(value);
      if (predicate(value)) {
        return value;
      }
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = toError(error);
      logger.debug(`Poll attempt ${attempts} failed: ${lastError.message}`, { attempt: attempts });
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ConvergenceTimeoutError(message, deadlineMs, attempts, lastObserved, lastError);
    }
    await delay(Math.min(intervalMs, remaining), signal);
  }
}

/**
 * ConvergencePoller facade.
 */
export const ConvergencePoller = {
  waitFor,

  /**
   * Retries `action` until it resolves once.
   *
   * Used for checks that succeed or fail as a whole, such as a
   * read-your-writes confirmation.
   *
   * @throws {ConvergenceTimeoutError} If no attempt succeeds before the deadline
   */
  retryUntil<T>(action: PollQuery<T>, options: PollOptions<T> = {}): Promise<T> {
    return waitFor(() => true, action, options);
  },

  /**
   * Waits until the view reported by `replicaId` satisfies `expected`.
   * Without an expectation the first successfully observed view is returned.
   */
  waitForView(
    cluster: ClusterController,
    replicaId: ReplicaId,
    expected: ViewPredicate = () => true,
    options: ViewWaitOptions = {},
  ): Promise<ViewNumber> {
    const { observer, onObservation, ...rest } = options;
    return waitFor(expected, (signal) => cluster.currentView(replicaId, signal), {
      message: `Timeout waiting for view on replica ${replicaId}`,
      ...rest,
      onObservation: (view) => {
        observer?.record(replicaId, view);
        onObservation?.(view);
      },
    });
  },

  /**
   * Waits until the slow commit path is prevalent on `replicaId`.
   */
  async waitForSlowPathPrevalent(
    cluster: ClusterController,
    replicaId: ReplicaId,
    options: PollOptions<boolean> = {},
  ): Promise<void> {
    await waitFor((prevalent) => prevalent, (signal) => cluster.isSlowPathPrevalent(replicaId, signal), {
      message: `Timeout waiting for the slow path to be prevalent on replica ${replicaId}`,
      ...options,
    });
  },
} as const;
