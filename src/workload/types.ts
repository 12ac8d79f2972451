/**
 * Type definitions for the workload module.
 *
 * The client protocol and the linearizability tracker are external
 * collaborators; only the operations the orchestrator needs are modelled.
 */

import type { ErrorKind } from '../core/errors.js';

/**
 * Key-value client of the cluster under test.
 *
 * Operations reject when the cluster cannot serve them. Unavailability
 * (timeouts, no quorum) should surface as a transient error so that callers
 * can tell it apart from programming errors.
 */
export interface KvClient {
  write(key: string, value: string, signal?: AbortSignal): Promise<void>;
  read(key: string, signal?: AbortSignal): Promise<string | undefined>;
  /** Distinguished "last committed block" query. */
  lastCommitted(signal?: AbortSignal): Promise<number>;
}

/**
 * History tracker that validates concurrent operations for linearizability.
 * Opaque: the orchestrator only consumes success or failure.
 */
export interface LinearizabilityTracker {
  runConcurrentOps(count: number, signal?: AbortSignal): Promise<void>;
  trackedReadYourWrites(signal?: AbortSignal): Promise<void>;
  /**
   * Sends tracked operations until `signal` is aborted, reporting every
   * operation to `recorder`.
   */
  sendIndefiniteTrackedOps(
    intensity: number,
    signal: AbortSignal,
    recorder: WorkloadRecorder,
  ): Promise<void>;
  /** Verifies the recorded history; rejects when it is not linearizable. */
  verify(): Promise<void>;
}

/**
 * Counters a workload updates while it works.
 */
export interface WorkloadRecorder {
  attempt(): void;
  success(): void;
  failure(error: unknown): void;
}

/**
 * A key/value pair written by the workload.
 */
export interface KeyValue {
  readonly key: string;
  readonly value: string;
}

/**
 * Lifecycle of a workload handle. Handles are never reused.
 */
export type WorkloadState = 'created' | 'running' | 'cancelled' | 'completed';

/**
 * Failure counters keyed by error kind; `unclassified` counts anything that
 * is not a classified error.
 */
export type FailureCounts = Readonly<Record<ErrorKind | 'unclassified', number>>;

/**
 * Outcome of a workload window.
 */
export interface WorkloadReport {
  /** Operations started. */
  readonly attempted: number;
  readonly succeeded: number;
  /** Operations that failed, including those cut off by cancellation. */
  readonly failed: number;
  readonly failuresByKind: FailureCounts;
  /** Whether the workload ended by cancellation rather than completing. */
  readonly cancelled: boolean;
  readonly durationMs: number;
}
