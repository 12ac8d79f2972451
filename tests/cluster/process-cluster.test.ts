/**
 * Tests for ProcessClusterController.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ProcessClusterController } from '../../src/cluster/process-cluster.js';
import type { ReplicaStatus } from '../../src/cluster/types.js';
import {
  ReplicaAlreadyRunningError,
  TransientObservationError,
  UnknownReplicaError,
} from '../../src/core/errors.js';
import type { ReplicaId } from '../../src/core/types.js';
import { FakeIntrospector, createFakeSpawner, type FakeReplicaProcess } from '../helpers/fake-replica-process.js';

function lastProcess(processes: FakeReplicaProcess[]): FakeReplicaProcess {
  const spawned = processes[processes.length - 1];
  if (!spawned) throw new Error('No process was spawned');
  return spawned;
}

describe('ProcessClusterController', () => {
  let introspector: FakeIntrospector;
  let spawner: ReturnType<typeof createFakeSpawner>;
  let cluster: ProcessClusterController;

  beforeEach(() => {
    introspector = new FakeIntrospector();
    spawner = createFakeSpawner();
    cluster = new ProcessClusterController({
      config: { n: 4, f: 1, c: 0 },
      replicaCommand: (id) => ({ command: './replica', args: ['-i', String(id)], env: { REPLICA: String(id) } }),
      introspector,
      stopTimeoutMs: 30,
      spawn: spawner.spawn,
    });
  });

  describe('lifecycle', () => {
    it('should start every replica with its own command', async () => {
      await cluster.startAll();

      expect(spawner.processes.map((p) => p.command.args)).toEqual([
        ['-i', '0'],
        ['-i', '1'],
        ['-i', '2'],
        ['-i', '3'],
      ]);
      expect(cluster.liveReplicas()).toEqual([0, 1, 2, 3]);
      expect(cluster.getReplicaInfo(2).status).toBe('running');
      expect(cluster.getReplicaInfo(2).pid).toBe(spawner.processes[2]?.pid);
    });

    it('should reject starting a running replica', async () => {
      await cluster.start(1);
      await expect(cluster.start(1)).rejects.toThrow(ReplicaAlreadyRunningError);
    });

    it('should stop with SIGTERM', async () => {
      await cluster.startAll();
      await cluster.stop(0);

      expect(spawner.processes[0]?.signals).toEqual(['SIGTERM']);
      expect(cluster.getReplicaInfo(0).status).toBe('stopped');
      expect(cluster.liveReplicas()).toEqual([1, 2, 3]);
      expect(cluster.liveCount()).toBe(3);
    });

    it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
      spawner = createFakeSpawner((p) => {
        p.ignoreSigterm = true;
      });
      cluster = new ProcessClusterController({
        config: { n: 4, f: 1, c: 0 },
        replicaCommand: () => ({ command: './replica', args: [] }),
        introspector,
        stopTimeoutMs: 20,
        spawn: spawner.spawn,
      });

      await cluster.start(0);
      await cluster.stop(0);

      expect(lastProcess(spawner.processes).signals).toEqual(['SIGTERM', 'SIGKILL']);
      expect(cluster.getReplicaInfo(0).status).toBe('stopped');
    });

    it('should make stop idempotent', async () => {
      await cluster.start(0);
      await cluster.stop(0);
      await cluster.stop(0);
      await cluster.stop(3);

      expect(spawner.processes[0]?.signals).toEqual(['SIGTERM']);
    });

    it('should restart a stopped replica with a new process', async () => {
      await cluster.start(0);
      await cluster.stop(0);
      await cluster.start(0);

      expect(spawner.processes).toHaveLength(2);
      expect(cluster.getReplicaInfo(0).status).toBe('running');
    });

    it('should mark a replica crashed when its process exits on its own', async () => {
      const exits: Array<[ReplicaId, number | null]> = [];
      cluster.on('unexpectedExit', (id, code) => exits.push([id, code]));

      await cluster.start(2);
      lastProcess(spawner.processes).crash(139);

      expect(cluster.getReplicaInfo(2).status).toBe('crashed');
      expect(exits).toEqual([[2, 139]]);
      await expect(cluster.start(2)).resolves.toBeUndefined();
    });

    it('should mark a replica crashed when its process fails to spawn', async () => {
      const exits: Array<[ReplicaId, number | null, string | null]> = [];
      cluster.on('unexpectedExit', (id, code, signal) => exits.push([id, code, signal]));

      await cluster.startAll();
      const failed = spawner.processes[1];
      if (!failed) throw new Error('Replica 1 was not spawned');
      failed.emitError(new Error('spawn ./replica ENOENT'));

      expect(cluster.getReplicaInfo(1).status).toBe('crashed');
      expect(cluster.liveReplicas()).toEqual([0, 2, 3]);
      expect(exits).toEqual([[1, null, null]]);
      await expect(cluster.currentView(1)).rejects.toBeInstanceOf(TransientObservationError);
    });

    it('should report a crash once when a failed process also exits', async () => {
      const exits: ReplicaId[] = [];
      cluster.on('unexpectedExit', (id) => exits.push(id));

      await cluster.start(3);
      const failed = lastProcess(spawner.processes);
      failed.emitError(new Error('spawn ./replica EACCES'));
      failed.crash(1);

      expect(exits).toEqual([3]);
      expect(cluster.getReplicaInfo(3).status).toBe('crashed');
    });

    it('should keep a stopping replica when its process reports an error', async () => {
      spawner = createFakeSpawner((replica) => {
        replica.ignoreSigterm = true;
      });
      cluster = new ProcessClusterController({
        config: { n: 4, f: 1, c: 0 },
        replicaCommand: (id) => ({ command: './replica', args: ['-i', String(id)] }),
        introspector,
        stopTimeoutMs: 30,
        spawn: spawner.spawn,
      });
      const exits: ReplicaId[] = [];
      cluster.on('unexpectedExit', (id) => exits.push(id));

      await cluster.start(0);
      const stopping = cluster.stop(0);
      lastProcess(spawner.processes).emitError(new Error('kill EPERM'));
      await stopping;

      expect(exits).toEqual([]);
      expect(cluster.getReplicaInfo(0).status).toBe('stopped');
    });

    it('should emit status changes', async () => {
      const changes: Array<[ReplicaId, ReplicaStatus]> = [];
      cluster.on('replicaStatusChange', (id, status) => changes.push([id, status]));

      await cluster.start(1);
      await cluster.stop(1);

      expect(changes).toEqual([
        [1, 'starting'],
        [1, 'running'],
        [1, 'stopping'],
        [1, 'stopped'],
      ]);
    });

    it('should reject unknown replicas', async () => {
      await expect(cluster.start(4)).rejects.toThrow(UnknownReplicaError);
      expect(() => cluster.getReplicaInfo(-1)).toThrow(UnknownReplicaError);
    });

    it('should stop everything on shutdown', async () => {
      await cluster.startAll();
      await cluster.shutdown();
      expect(cluster.liveCount()).toBe(0);
    });
  });

  describe('queries', () => {
    it('should exclude replicas from listings', async () => {
      await cluster.startAll();
      await cluster.stop(1);

      expect(cluster.allReplicas([0, 3])).toEqual([1, 2]);
      expect(cluster.liveReplicas([0])).toEqual([2, 3]);
    });

    it('should read the view of a running replica', async () => {
      await cluster.startAll();
      introspector.views.set(2, 5);

      await expect(cluster.currentView(2)).resolves.toBe(5);
    });

    it('should fail transiently for a replica that is down', async () => {
      await expect(cluster.currentView(0)).rejects.toThrow('Replica 0: not reachable (status: stopped)');
      await expect(cluster.currentView(0)).rejects.toBeInstanceOf(TransientObservationError);
    });

    it('should wrap introspection failures as transient', async () => {
      await cluster.start(0);
      introspector.failure = new Error('ECONNREFUSED');

      const error = await cluster.currentView(0).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TransientObservationError);
      expect(error).toMatchObject({ message: 'Replica 0: view query failed', replicaId: 0 });
    });

    it('should derive the cluster view and primary from the first live replica', async () => {
      await cluster.startAll();
      await cluster.stop(0);
      introspector.views.set(1, 5);
      introspector.views.set(2, 4);

      await expect(cluster.clusterView()).resolves.toBe(5);
      await expect(cluster.currentPrimary()).resolves.toBe(1);
    });

    it('should fail transiently when no replica answers', async () => {
      await expect(cluster.clusterView()).rejects.toThrow('No live replica reported its view');
    });

    it('should report the commit path', async () => {
      await cluster.start(3);
      introspector.slowPath.set(3, true);

      await expect(cluster.isSlowPathPrevalent(3)).resolves.toBe(true);
      await expect(cluster.isSlowPathPrevalent(0)).rejects.toBeInstanceOf(TransientObservationError);
    });
  });
});
