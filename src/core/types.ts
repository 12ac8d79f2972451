/**
 * Core type definitions for bft-chaos.
 *
 * Cluster sizing, replica and view identifiers, and the default timing
 * parameters shared by the poller, the workload generator and the scenarios.
 */

// =============================================================================
// Cluster Sizing
// =============================================================================

/**
 * Stable identity of a replica process, in `[0, n)`.
 */
export type ReplicaId = number;

/**
 * Leadership epoch. The replica whose id equals `view mod n` is the primary.
 */
export type ViewNumber = number;

/**
 * Immutable sizing parameters of the cluster under test.
 *
 * The deployment is expected to satisfy `n >= 3f + 2c + 1`.
 */
export interface ClusterConfig {
  /** Total number of replicas. */
  readonly n: number;
  /** Maximum number of tolerated faulty replicas. */
  readonly f: number;
  /** Maximum number of tolerated slow replicas (fast-path commit). */
  readonly c: number;
}

/**
 * Number of live replicas required for progress and for a view change.
 */
export function quorumSize(config: ClusterConfig): number {
  return 2 * config.f + 2 * config.c + 1;
}

/**
 * Returns the expected primary of a view.
 */
export function primaryOf(view: ViewNumber, n: number): ReplicaId {
  return view % n;
}

/**
 * Whether the cluster sizing satisfies `n >= 3f + 2c + 1`.
 */
export function satisfiesQuorumPrecondition(config: ClusterConfig): boolean {
  return (
    Number.isInteger(config.n) &&
    Number.isInteger(config.f) &&
    Number.isInteger(config.c) &&
    config.f >= 0 &&
    config.c >= 0 &&
    config.n >= 3 * config.f + 2 * config.c + 1
  );
}

/**
 * View a cluster converges to after `crashedLeaders` consecutive primaries,
 * starting with the primary of `initialView`, are down.
 *
 * Each crashed leader costs one view: with the primary and the next primary
 * down, the first view change cannot complete and replicas move on to
 * `initialView + 2`.
 */
export function expectedViewAfterCrashes(
  initialView: ViewNumber,
  crashedLeaders: number,
): ViewNumber {
  if (!Number.isInteger(crashedLeaders) || crashedLeaders < 0) {
    throw new RangeError(`crashedLeaders must be a non-negative integer, got ${crashedLeaders}`);
  }
  return initialView + crashedLeaders;
}

/**
 * Predicate over an observed view.
 */
export type ViewPredicate = (view: ViewNumber) => boolean;

// =============================================================================
// Defaults
// =============================================================================

/**
 * Default timing parameters, in milliseconds unless noted otherwise.
 */
export const DEFAULTS = {
  STATUS_POLL_INTERVAL_MS: 100,
  PER_POLL_TIMEOUT_MS: 5000,
  VIEW_WAIT_DEADLINE_MS: 30000,
  WORKLOAD_WINDOW_MS: 1000,
  READ_YOUR_WRITES_DEADLINE_MS: 60000,
  READ_YOUR_WRITES_ATTEMPT_TIMEOUT_MS: 5000,
  SETTLE_AFTER_VIEW_CHANGE_MS: 10000,
  SETTLE_AFTER_RESTART_MS: 5000,
  /** Size of the tracked batch run after a view change (operations). */
  CONCURRENT_OPS: 100,
  /** Size of the batch that stabilises the initial view (operations). */
  WARMUP_OPS: 50,
  /** Concurrent workers of an indefinite workload. */
  WORKLOAD_INTENSITY: 1,
  STOP_TIMEOUT_MS: 5000,
  /** Replica status timer passed to the replica binary. */
  STATUS_TIMER_MS: 500,
  /** Replica view-change timeout passed to the replica binary. */
  VIEW_CHANGE_TIMEOUT_MS: 10000,
} as const;
