/**
 * Replica process lifecycle management.
 *
 * Each replica runs as a separate child process launched from a
 * caller-supplied command. The controller tracks process status, stops
 * replicas with SIGTERM (escalating to SIGKILL), and delegates view
 * introspection to a `ReplicaIntrospector`.
 *
 * @module cluster/process-cluster
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import {
  ReplicaAlreadyRunningError,
  ScenarioError,
  TransientObservationError,
  UnknownReplicaError,
  toError,
} from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { DEFAULTS, primaryOf, type ClusterConfig, type ReplicaId, type ViewNumber } from '../core/types.js';
import type {
  ClusterController,
  ClusterControllerEvents,
  ReplicaCommand,
  ReplicaInfo,
  ReplicaIntrospector,
  ReplicaStatus,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal view of a launched replica process.
 */
export interface ReplicaProcess {
  readonly pid: number | undefined;
  readonly exited: boolean;
  kill(signal: NodeJS.Signals): void;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (error: Error) => void): void;
}

/**
 * Launches a replica process.
 */
export type SpawnReplica = (command: ReplicaCommand) => ReplicaProcess;

/**
 * Configuration for a process-backed cluster.
 */
export interface ProcessClusterOptions {
  readonly config: ClusterConfig;
  /** Builds the launch command of a replica. */
  readonly replicaCommand: (replicaId: ReplicaId) => ReplicaCommand;
  readonly introspector: ReplicaIntrospector;
  /** Grace period between SIGTERM and SIGKILL. Default: 5000. */
  readonly stopTimeoutMs?: number;
  /** Process launcher. Default: `node:child_process` spawn. */
  readonly spawn?: SpawnReplica;
  readonly logger?: Logger;
}

/**
 * Managed replica.
 */
interface ManagedReplica {
  process: ReplicaProcess | null;
  status: ReplicaStatus;
  startedAt: number | null;
  exitWaiters: Array<() => void>;
}

function adaptChildProcess(child: ChildProcess): ReplicaProcess {
  return {
    get pid() {
      return child.pid;
    },
    get exited() {
      return child.exitCode !== null || child.signalCode !== null;
    },
    kill: (signal) => {
      child.kill(signal);
    },
    onExit: (listener) => {
      child.once('exit', listener);
    },
    onError: (listener) => {
      child.on('error', listener);
    },
  };
}

/**
 * Spawns a replica with `node:child_process`, inheriting the environment.
 */
export const spawnChildReplica: SpawnReplica = (command) =>
  adaptChildProcess(
    spawn(command.command, [...command.args], {
      stdio: 'ignore',
      env: { ...process.env, ...command.env },
    }),
  );

// =============================================================================
// ProcessClusterController
// =============================================================================

/**
 * Controls a cluster of replica processes.
 *
 * @example
 * ```typescript
 * const cluster = new ProcessClusterController({
 *   config: { n: 4, f: 1, c: 0 },
 *   replicaCommand: (id) => ({ command: './replica', args: ['-i', String(id)] }),
 *   introspector: metricsClient,
 * });
 *
 * await cluster.startAll();
 * await cluster.stop(0);
 * // ...
 * await cluster.shutdown();
 * ```
 */
export class ProcessClusterController
  extends EventEmitter<ClusterControllerEvents>
  implements ClusterController
{
  readonly config: ClusterConfig;
  private readonly replicas: Map<ReplicaId, ManagedReplica> = new Map();
  private readonly replicaCommand: (replicaId: ReplicaId) => ReplicaCommand;
  private readonly introspector: ReplicaIntrospector;
  private readonly stopTimeoutMs: number;
  private readonly spawnReplica: SpawnReplica;
  private readonly logger: Logger;

  constructor(options: ProcessClusterOptions) {
    super();
    this.config = options.config;
    this.replicaCommand = options.replicaCommand;
    this.introspector = options.introspector;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULTS.STOP_TIMEOUT_MS;
    this.spawnReplica = options.spawn ?? spawnChildReplica;
    this.logger = options.logger ?? silentLogger();

    for (let id = 0; id < this.config.n; id++) {
      this.replicas.set(id, { process: null, status: 'stopped', startedAt: null, exitWaiters: [] });
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async startAll(): Promise<void> {
    for (const [id, replica] of this.replicas) {
      if (!isUp(replica.status)) {
        await this.start(id);
      }
    }
  }

  async start(replicaId: ReplicaId): Promise<void> {
    const replica = this.getReplica(replicaId);
    if (isUp(replica.status)) {
      throw new ReplicaAlreadyRunningError(replicaId);
    }

    this.setStatus(replicaId, replica, 'starting');
    const child = this.spawnReplica(this.replicaCommand(replicaId));
    replica.process = child;
    replica.exitWaiters = [];

    // A restarted replica has a new process; events of the old one are ignored.
    child.onError((error) => {
      if (replica.process !== child) return;
      this.logger.warn(`Replica ${replicaId} process error: ${error.message}`, { replicaId });

      // Spawn failures (e.g. a missing binary) leave no process behind.
      if (!child.exited && isAlive(replica.status)) {
        this.markCrashed(replicaId, replica, null, null);
        releaseExitWaiters(replica);
      }
    });

    child.onExit((code, signal) => {
      if (replica.process !== child) return;

      if (isAlive(replica.status)) {
        this.markCrashed(replicaId, replica, code, signal);
      }
      releaseExitWaiters(replica);
    });

    replica.startedAt = Date.now();
    this.setStatus(replicaId, replica, 'running');
    this.logger.info(`Replica ${replicaId} started`, { replicaId, pid: child.pid });
  }

  async stop(replicaId: ReplicaId): Promise<void> {
    const replica = this.getReplica(replicaId);
    const child = replica.process;

    if (!child || replica.status === 'stopped' || replica.status === 'crashed') {
      return;
    }

    this.setStatus(replicaId, replica, 'stopping');

    if (!child.exited) {
      child.kill('SIGTERM');
      const exited = await this.waitForExit(replica, child, this.stopTimeoutMs);
      if (!exited) {
        this.logger.warn(`Replica ${replicaId} ignored SIGTERM, sending SIGKILL`, { replicaId });
        child.kill('SIGKILL');
        await this.waitForExit(replica, child, this.stopTimeoutMs);
      }
    }

    this.setStatus(replicaId, replica, 'stopped');
    this.logger.info(`Replica ${replicaId} stopped`, { replicaId });
  }

  /**
   * Stops every replica.
   */
  async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.replicas.keys()).map((id) => this.stop(id)));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  allReplicas(without: Iterable<ReplicaId> = []): ReplicaId[] {
    const excluded = new Set(without);
    return Array.from(this.replicas.keys())
      .filter((id) => !excluded.has(id))
      .sort((a, b) => a - b);
  }

  liveReplicas(without: Iterable<ReplicaId> = []): ReplicaId[] {
    return this.allReplicas(without).filter((id) => this.replicas.get(id)?.status === 'running');
  }

  liveCount(): number {
    return this.liveReplicas().length;
  }

  /**
   * Returns information about a specific replica.
   */
  getReplicaInfo(replicaId: ReplicaId): ReplicaInfo {
    const replica = this.getReplica(replicaId);
    return {
      replicaId,
      status: replica.status,
      startedAt: replica.startedAt,
      pid: replica.process?.pid ?? null,
    };
  }

  async currentView(replicaId: ReplicaId, signal?: AbortSignal): Promise<ViewNumber> {
    this.assertReachable(replicaId);
    try {
      return await this.introspector.view(replicaId, signal);
    } catch (error) {
      throw asTransient(replicaId, 'view query failed', error);
    }
  }

  async clusterView(signal?: AbortSignal): Promise<ViewNumber> {
    let lastError: Error | undefined;
    for (const id of this.liveReplicas()) {
      try {
        return await this.currentView(id, signal);
      } catch (error) {
        lastError = toError(error);
      }
    }
    throw new TransientObservationError(undefined, 'No live replica reported its view', lastError);
  }

  async currentPrimary(signal?: AbortSignal): Promise<ReplicaId> {
    return primaryOf(await this.clusterView(signal), this.config.n);
  }

  async isSlowPathPrevalent(replicaId: ReplicaId, signal?: AbortSignal): Promise<boolean> {
    this.assertReachable(replicaId);
    try {
      return await this.introspector.slowPathPrevalent(replicaId, signal);
    } catch (error) {
      throw asTransient(replicaId, 'commit path query failed', error);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private getReplica(replicaId: ReplicaId): ManagedReplica {
    const replica = this.replicas.get(replicaId);
    if (!replica) {
      throw new UnknownReplicaError(replicaId, this.config.n);
    }
    return replica;
  }

  private assertReachable(replicaId: ReplicaId): void {
    const replica = this.getReplica(replicaId);
    if (replica.status !== 'running') {
      throw new TransientObservationError(replicaId, `not reachable (status: ${replica.status})`);
    }
  }

  private markCrashed(
    replicaId: ReplicaId,
    replica: ManagedReplica,
    code: number | null,
    signal: NodeJS.Signals | null,
  ): void {
    this.setStatus(replicaId, replica, 'crashed');
    this.logger.warn(`Replica ${replicaId} exited unexpectedly`, { replicaId, code, signal });
    this.emit('unexpectedExit', replicaId, code, signal);
  }

  private setStatus(replicaId: ReplicaId, replica: ManagedReplica, status: ReplicaStatus): void {
    replica.status = status;
    this.emit('replicaStatusChange', replicaId, status);
  }

  private waitForExit(
    replica: ManagedReplica,
    child: ReplicaProcess,
    timeoutMs: number,
  ): Promise<boolean> {
    if (child.exited) return Promise.resolve(true);

    return new Promise((resolve) => {
      const timeout = setTimeout(() => resolve(false), timeoutMs);
      replica.exitWaiters.push(() => {
        clearTimeout(timeout);
        resolve(true);
      });
    });
  }
}

function isAlive(status: ReplicaStatus): boolean {
  return status === 'starting' || status === 'running';
}

function releaseExitWaiters(replica: ManagedReplica): void {
  const waiters = replica.exitWaiters;
  replica.exitWaiters = [];
  for (const waiter of waiters) waiter();
}

function isUp(status: ReplicaStatus): boolean {
  return status === 'starting' || status === 'running' || status === 'stopping';
}

function asTransient(replicaId: ReplicaId, message: string, error: unknown): Error {
  if (error instanceof ScenarioError) {
    return error;
  }
  return new TransientObservationError(replicaId, message, toError(error));
}
