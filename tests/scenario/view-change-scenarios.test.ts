/**
 * View-change scenarios against the simulated cluster.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { ScenarioRunner } from '../../src/scenario/runner.js';
import {
  listViewChangeScenarios,
  singleViewChangeWithConsecutiveFailedPrimaries,
  viewChangeScenarios,
  type ViewChangeScenarioName,
} from '../../src/scenario/view-change-scenarios.js';
import { resolveSettings, type HarnessSettings } from '../../src/core/settings.js';
import {
  AssertionViolationError,
  ConfigurationError,
  ConvergenceTimeoutError,
  TransientObservationError,
} from '../../src/core/errors.js';
import { createSeededRandom, pickRandom } from '../../src/core/random.js';
import type { ClusterConfig, ReplicaId, ViewNumber } from '../../src/core/types.js';
import type { ScenarioResult } from '../../src/scenario/types.js';
import { createTestContext } from '../helpers/context.js';
import { FAST_SETTINGS, SimulatedCluster, type SimulatedClusterOptions } from '../helpers/simulated-cluster.js';

const FOUR: ClusterConfig = { n: 4, f: 1, c: 0 };
const SEVEN: ClusterConfig = { n: 7, f: 2, c: 0 };

/**
 * Cluster whose replicas do not answer their first status query, as while
 * the processes are still booting.
 */
class BootingCluster extends SimulatedCluster {
  private readonly booted: Set<ReplicaId> = new Set();
  private clusterViewQueries = 0;

  override async currentView(replicaId: ReplicaId): Promise<ViewNumber> {
    if (!this.booted.has(replicaId)) {
      this.booted.add(replicaId);
      throw new TransientObservationError(replicaId, 'still booting');
    }
    return super.currentView(replicaId);
  }

  override async clusterView(): Promise<ViewNumber> {
    if (this.clusterViewQueries++ === 0) {
      throw new TransientObservationError(undefined, 'replicas still booting');
    }
    return super.clusterView();
  }
}

const CANONICAL_PHASES = [
  'all_up',
  'baseline_written',
  'primary_crashed',
  'workload_injecting',
  'view_converged',
  'post_convergence_verified',
];

describe('view-change scenarios', () => {
  let cluster: SimulatedCluster;

  afterEach(() => {
    cluster?.dispose();
  });

  async function run(
    name: ViewChangeScenarioName,
    options: SimulatedClusterOptions,
    settings: Partial<HarnessSettings> = {},
  ): Promise<ScenarioResult> {
    return runOn(new SimulatedCluster({ viewChangeTimeoutMs: 100, ...options }), name, settings);
  }

  async function runOn(
    target: SimulatedCluster,
    name: ViewChangeScenarioName,
    settings: Partial<HarnessSettings> = {},
  ): Promise<ScenarioResult> {
    cluster = target;
    const runner = new ScenarioRunner({
      cluster,
      client: cluster,
      tracker: cluster,
      settings: resolveSettings({ ...FAST_SETTINGS, seed: 7, ...settings }),
      includeUnstable: true,
    });
    return runner.run(viewChangeScenarios[name]);
  }

  function phasesOf(result: ScenarioResult): string[] {
    return result.phases.map((p) => p.phase);
  }

  it('should list every scenario', () => {
    expect(listViewChangeScenarios()).toHaveLength(7);
    expect(viewChangeScenarios.multipleViewChangesSlowPath.unstable).toBe(true);
    expect(viewChangeScenarios.skipViewCurrentAndNextPrimariesDown.selectConfigs(4, 1, 0)).toBe(false);
  });

  describe('request not written while primary down', () => {
    it('should commit nothing while the primary is down', async () => {
      const result = await run('requestNotWrittenPrimaryDown', { config: FOUR });

      expect(result.error).toBeUndefined();
      expect(result.status).toBe('passed');
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      expect(cluster.lastBlock).toBe(1);
      expect(cluster.viewChanges).toBe(1);
    });

    it('should fail when the view change completes inside the workload window', async () => {
      const result = await run('requestNotWrittenPrimaryDown', { config: FOUR, viewChangeTimeoutMs: 5 });

      expect(result.status).toBe('failed');
      expect(result.error).toBeInstanceOf(AssertionViolationError);
      expect(result.error?.message).toMatch(/^A block was committed while the primary was down \(expected: 1, /);
      expect(phasesOf(result).at(-1)).toBe('failed');
    });

    it('should refuse a workload window that is not shorter than the view-change timeout', async () => {
      const result = await run(
        'requestNotWrittenPrimaryDown',
        { config: FOUR },
        { workloadWindowMs: 100, viewChangeTimeoutMs: 100 },
      );

      expect(result.status).toBe('failed');
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error?.message).toBe(
        'Workload window of 100ms must be shorter than the view-change timeout of 100ms',
      );
      expect(phasesOf(result)).toEqual(['all_up', 'failed']);
      expect(cluster.stopped).toEqual([]);
    });

    it('should refuse to crash the primary when no quorum would remain', async () => {
      cluster = new SimulatedCluster({ config: FOUR });
      await cluster.startAll();
      await cluster.stop(3);
      const { ctx, phases } = createTestContext(cluster);

      const error = await viewChangeScenarios.requestNotWrittenPrimaryDown.body(ctx).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: 'Crashing [0] leaves 2 live replicas, fewer than the 3 required for a view change',
      });
      expect(phases).toEqual(['baseline_written']);
      expect(cluster.stopped).toEqual([3]);
    });
  });

  describe('single view change, only primary down', () => {
    it('should converge on view 1 with n=4, f=1', async () => {
      const result = await run('singleViewChangeOnlyPrimaryDown', { config: FOUR });

      expect(result.error).toBeUndefined();
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      expect(cluster.stopped).toEqual([0]);
      await expect(cluster.clusterView()).resolves.toBe(1);
      await expect(cluster.currentPrimary()).resolves.toBe(1);
    });

    it('should read its own write through a surviving replica after convergence', async () => {
      const result = await run('singleViewChangeOnlyPrimaryDown', { config: FOUR });
      expect(result.status).toBe('passed');

      await cluster.write('k1', 'v1');
      const reader = pickRandom([1, 2, 3], createSeededRandom(3));

      await expect(cluster.readOn(reader, 'k1')).resolves.toBe('v1');
      await expect(cluster.readOn(0, 'k1')).rejects.toBeInstanceOf(TransientObservationError);
    });

    it('should retry while the replicas are still booting', async () => {
      const booting = new BootingCluster({ config: FOUR, viewChangeTimeoutMs: 100 });
      const result = await runOn(booting, 'singleViewChangeOnlyPrimaryDown');

      expect(result.error).toBeUndefined();
      expect(result.status).toBe('passed');
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      expect(cluster.stopped).toEqual([0]);
    });

    it('should fail with a convergence timeout when no view change happens', async () => {
      const result = await run(
        'singleViewChangeOnlyPrimaryDown',
        { config: FOUR, viewChangesEnabled: false },
        { viewWaitDeadlineMs: 100 },
      );

      expect(result.status).toBe('failed');
      expect(result.error).toBeInstanceOf(ConvergenceTimeoutError);
      expect(result.error?.message).toMatch(/^Make sure view change has been triggered \(no convergence after 100ms/);
      expect(phasesOf(result)).toEqual([
        'all_up',
        'baseline_written',
        'primary_crashed',
        'workload_injecting',
        'failed',
      ]);
    });
  });

  describe('single view change, f replicas down', () => {
    it('should crash f replicas but keep the next primary', async () => {
      const result = await run('singleViewChangeWithFReplicasDown', { config: SEVEN });

      expect(result.error).toBeUndefined();
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      expect(cluster.stopped).toHaveLength(2);
      expect(cluster.stopped[0]).toBe(0);
      expect(cluster.stopped).not.toContain(1);
      await expect(cluster.clusterView()).resolves.toBe(1);
    });

    it('should pass on the minimal cluster', async () => {
      const result = await run('singleViewChangeWithFReplicasDown', { config: FOUR });

      expect(result.status).toBe('passed');
      expect(cluster.stopped).toEqual([0]);
    });
  });

  describe('crashed replica catches up after view change', () => {
    it('should be skipped when f < 2', async () => {
      const result = await run('crashedReplicaCatchUpAfterViewChange', { config: FOUR });

      expect(result.status).toBe('skipped');
      expect(result.skipReason).toBe('not selected for n=4, f=1, c=0');
    });

    it('should bring the lagging replica into the new view', async () => {
      const result = await run('crashedReplicaCatchUpAfterViewChange', { config: SEVEN });

      expect(result.error).toBeUndefined();
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      const [unstable, primary] = cluster.stopped;
      expect(primary).toBe(0);
      expect(unstable).not.toBe(1);
      expect(cluster.liveCount()).toBe(6);
    });
  });

  describe('restart replica after view change', () => {
    it('should restart the former primary and another replica', async () => {
      const result = await run('restartReplicaAfterViewChange', { config: FOUR });

      expect(result.error).toBeUndefined();
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      expect(cluster.stopped[0]).toBe(0);
      expect([2, 3]).toContain(cluster.stopped[1]);
      expect(cluster.liveCount()).toBe(4);
      await expect(cluster.currentView(0)).resolves.toBe(1);
    });
  });

  describe('multiple view changes on the slow path', () => {
    it('should move through two view changes', async () => {
      const result = await run('multipleViewChangesSlowPath', { config: FOUR });

      expect(result.error).toBeUndefined();
      expect(result.status).toBe('passed');
      expect(cluster.stopped).toEqual([0, 1]);
      expect(cluster.viewChanges).toBe(2);
      expect(phasesOf(result).filter((p) => p === 'view_converged')).toHaveLength(2);
      expect(phasesOf(result).at(-1)).toBe('post_convergence_verified');
    });

    it('should be skipped when c >= f', async () => {
      cluster = new SimulatedCluster({ config: { n: 6, f: 1, c: 1 } });
      const runner = new ScenarioRunner({
        cluster,
        client: cluster,
        settings: resolveSettings(FAST_SETTINGS),
        includeUnstable: true,
      });

      const result = await runner.run(viewChangeScenarios.multipleViewChangesSlowPath);
      expect(result.status).toBe('skipped');
    });
  });

  describe('skip view, current and next primaries down', () => {
    it('should converge on view 2 with n=7, f=2', async () => {
      const result = await run('skipViewCurrentAndNextPrimariesDown', { config: SEVEN });

      expect(result.error).toBeUndefined();
      expect(phasesOf(result)).toEqual(CANONICAL_PHASES);
      expect(cluster.stopped).toEqual([0, 1]);
      expect(cluster.viewChanges).toBe(2);
      await expect(cluster.clusterView()).resolves.toBe(2);
      await expect(cluster.currentPrimary()).resolves.toBe(2);
    });

    it('should read its own write in view 2', async () => {
      const result = await run('skipViewCurrentAndNextPrimariesDown', { config: SEVEN });
      expect(result.status).toBe('passed');

      await cluster.write('k1', 'v1');
      const reader = pickRandom([2, 3, 4, 5, 6], createSeededRandom(3));

      await expect(cluster.readOn(reader, 'k1')).resolves.toBe('v1');
      await expect(cluster.readOn(1, 'k1')).rejects.toBeInstanceOf(TransientObservationError);
    });
  });

  describe('consecutive failed primaries', () => {
    it('should refuse to crash more primaries than the quorum allows', async () => {
      cluster = new SimulatedCluster({ config: FOUR });
      await cluster.startAll();
      const { ctx, phases } = createTestContext(cluster);

      const error = await singleViewChangeWithConsecutiveFailedPrimaries(2)(ctx).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: 'Crashing [0, 1] leaves 2 live replicas, fewer than the 3 required for a view change',
      });
      expect(phases).toEqual(['baseline_written']);
      expect(cluster.stopped).toEqual([]);
    });
  });
});
