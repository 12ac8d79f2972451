/**
 * Error classes.
 *
 * Every error raised by the orchestrator falls into one of four kinds:
 *
 * - `transient`: an observation failed while the cluster is expected to be
 *   partially unavailable. Retried by the poller and the workload layer.
 * - `deadline`: an overall wait elapsed without the expected outcome.
 * - `configuration`: the requested scenario cannot be run meaningfully.
 * - `assertion`: the cluster was observed in a state it must not be in.
 */

import type { ReplicaId } from './types.js';

export type ErrorKind = 'transient' | 'deadline' | 'configuration' | 'assertion';

/**
 * Base class for all classified errors.
 */
export abstract class ScenarioError extends Error {
  abstract readonly kind: ErrorKind;
}

// =============================================================================
// Transient
// =============================================================================

/**
 * A replica could not be observed, typically because it is down or in the
 * middle of a view change.
 */
export class TransientObservationError extends ScenarioError {
  override readonly name = 'TransientObservationError' as const;
  readonly kind = 'transient' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly replicaId: ReplicaId | undefined,
    message: string,
    cause?: Error,
  ) {
    super(replicaId === undefined ? message : `Replica ${replicaId}: ${message}`);
    this.cause = cause;
  }
}

/**
 * A single poll attempt did not answer within its own timeout.
 */
export class PollAttemptTimeoutError extends ScenarioError {
  override readonly name = 'PollAttemptTimeoutError' as const;
  readonly kind = 'transient' as const;

  constructor(readonly timeoutMs: number) {
    super(`Poll attempt timed out after ${timeoutMs}ms`);
  }
}

// =============================================================================
// Deadline
// =============================================================================

/**
 * The overall deadline of a convergence wait elapsed.
 */
export class ConvergenceTimeoutError<T = unknown> extends ScenarioError {
  override readonly name = 'ConvergenceTimeoutError' as const;
  readonly kind = 'deadline' as const;

  constructor(
    message: string,
    readonly deadlineMs: number,
    readonly attempts: number,
    readonly lastObserved: T | undefined,
    readonly lastError: Error | undefined,
  ) {
    super(
      `${message} (no convergence after ${deadlineMs}ms, ${attempts} attempts` +
        (lastObserved !== undefined ? `, last observed: ${String(lastObserved)}` : '') +
        (lastError !== undefined ? `, last error: ${lastError.message}` : '') +
        ')',
    );
  }
}

/**
 * An operation bounded by `failAfter` did not complete in time.
 */
export class DeadlineExceededError extends ScenarioError {
  override readonly name = 'DeadlineExceededError' as const;
  readonly kind = 'deadline' as const;

  constructor(readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * The scenario or one of its steps was requested with parameters that cannot
 * produce a meaningful result.
 */
export class ConfigurationError extends ScenarioError {
  override readonly name: string = 'ConfigurationError';
  readonly kind = 'configuration' as const;
}

/**
 * Fewer crash candidates are available than the crash plan requires.
 */
export class InsufficientCrashCandidatesError extends ConfigurationError {
  override readonly name = 'InsufficientCrashCandidatesError' as const;

  constructor(
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      `Cannot crash ${requested} replicas: only ${available} candidates besides the primary ` +
        `are live and unprotected (need ${requested - 1})`,
    );
  }
}

/**
 * `start()` was called on a replica that is already running.
 */
export class ReplicaAlreadyRunningError extends ConfigurationError {
  override readonly name = 'ReplicaAlreadyRunningError' as const;

  constructor(readonly replicaId: ReplicaId) {
    super(`Replica ${replicaId} is already running`);
  }
}

/**
 * A replica id outside `[0, n)` was used.
 */
export class UnknownReplicaError extends ConfigurationError {
  override readonly name = 'UnknownReplicaError' as const;

  constructor(
    readonly replicaId: ReplicaId,
    readonly n: number,
  ) {
    super(`Replica ${replicaId} does not exist in a cluster of ${n} replicas`);
  }
}

/**
 * A workload handle was started a second time.
 */
export class WorkloadHandleReusedError extends ConfigurationError {
  override readonly name = 'WorkloadHandleReusedError' as const;

  constructor(readonly state: string) {
    super(`Workload handle cannot be started from state '${state}'`);
  }
}

// =============================================================================
// Assertion
// =============================================================================

/**
 * The cluster was observed in a state that contradicts the scenario.
 */
export class AssertionViolationError extends ScenarioError {
  override readonly name: string = 'AssertionViolationError';
  readonly kind = 'assertion' as const;

  constructor(
    message: string,
    readonly expected: unknown,
    readonly observed: unknown,
  ) {
    super(`${message} (expected: ${describe(expected)}, observed: ${describe(observed)})`);
  }
}

/**
 * Too few replicas are live to allow the progress the scenario expects.
 */
export class QuorumViolationError extends AssertionViolationError {
  override readonly name = 'QuorumViolationError' as const;

  constructor(
    readonly required: number,
    readonly live: number,
  ) {
    super('Not enough live replicas for a successful view change', `>= ${required}`, live);
  }
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Whether an error is a transient observation failure that may be retried.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof ScenarioError && error.kind === 'transient';
}

/**
 * Returns the kind of a classified error, or `undefined` for anything else
 * (which is treated as a programming error and never retried).
 */
export function classifyError(error: unknown): ErrorKind | undefined {
  return error instanceof ScenarioError ? error.kind : undefined;
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describe(value: unknown): string {
  if (value instanceof Set) {
    return `{${Array.from(value).map(String).join(', ')}}`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}
