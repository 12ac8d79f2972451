/**
 * Cluster controller contract.
 *
 * The orchestrator never talks to replica processes directly; everything it
 * needs from the cluster goes through `ClusterController`.
 */

import type { ClusterConfig, ReplicaId, ViewNumber } from '../core/types.js';

/**
 * Lifecycle status of a replica process.
 */
export type ReplicaStatus = 'starting' | 'running' | 'stopping' | 'stopped' | 'crashed';

/**
 * Snapshot of a replica's process state.
 */
export interface ReplicaInfo {
  readonly replicaId: ReplicaId;
  readonly status: ReplicaStatus;
  /** Timestamp of the last successful start, or null if never started. */
  readonly startedAt: number | null;
  /** Process ID of the running process, or null. */
  readonly pid: number | null;
}

/**
 * Owner of the replica lifecycle and view/primary introspection.
 *
 * `stop` is idempotent. `start` on a running replica rejects with
 * `ReplicaAlreadyRunningError`. `currentView` rejects with
 * `TransientObservationError` when the replica cannot be reached.
 */
export interface ClusterController {
  readonly config: ClusterConfig;

  /** Starts every replica that is not running. */
  startAll(): Promise<void>;
  start(replicaId: ReplicaId): Promise<void>;
  stop(replicaId: ReplicaId): Promise<void>;

  /** Every replica id in ascending order, minus `without`. */
  allReplicas(without?: Iterable<ReplicaId>): ReplicaId[];
  /** Running replica ids in ascending order, minus `without`. */
  liveReplicas(without?: Iterable<ReplicaId>): ReplicaId[];
  liveCount(): number;

  currentView(replicaId: ReplicaId, signal?: AbortSignal): Promise<ViewNumber>;
  /** View agreed by the live replicas, read from the first one that answers. */
  clusterView(signal?: AbortSignal): Promise<ViewNumber>;
  currentPrimary(signal?: AbortSignal): Promise<ReplicaId>;
  /** Whether the slow commit path has been dominant on a replica. */
  isSlowPathPrevalent(replicaId: ReplicaId, signal?: AbortSignal): Promise<boolean>;
}

/**
 * Per-replica view introspection, typically backed by the replica's metrics
 * endpoint. Implementations may fail in any way when the replica is down;
 * the controller wraps such failures into transient errors.
 */
export interface ReplicaIntrospector {
  view(replicaId: ReplicaId, signal?: AbortSignal): Promise<ViewNumber>;
  slowPathPrevalent(replicaId: ReplicaId, signal?: AbortSignal): Promise<boolean>;
}

/**
 * Command used to launch a replica process.
 */
export interface ReplicaCommand {
  readonly command: string;
  readonly args: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
}

/**
 * Events emitted by the process cluster controller.
 */
export interface ClusterControllerEvents {
  /** Emitted whenever a replica changes status. */
  replicaStatusChange: [replicaId: ReplicaId, status: ReplicaStatus];
  /** Emitted when a replica process exits without a requested stop. */
  unexpectedExit: [replicaId: ReplicaId, code: number | null, signal: string | null];
}
