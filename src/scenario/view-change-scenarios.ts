/**
 * View-change failure scenarios.
 *
 * Each scenario is a fixed sequence of crashes, bounded workload windows,
 * convergence waits and assertions. The expected view after a crash is always
 * computed explicitly from the number of consecutive crashed leaders.
 *
 * @module scenario/view-change-scenarios
 */

import { AssertionViolationError, ConfigurationError } from '../core/errors.js';
import { pickRandom } from '../core/random.js';
import { expectedViewAfterCrashes, primaryOf, type ReplicaId } from '../core/types.js';
import { FaultInjector } from '../fault/fault-injector.js';
import { ConvergencePoller } from '../poller/convergence-poller.js';
import { defineScenario, verifyLinearizability, verifyViewMonotonicity } from './builder.js';
import {
  assertPlanKeepsQuorum,
  readClusterView,
  readLastCommitted,
  runConcurrentOps,
  sendRandomWrites,
  settle,
  startReplica,
  waitForReadYourWrites,
  waitForView,
  waitForViewOnRandomReplica,
} from './steps.js';
import type { ScenarioBody, ScenarioDefinition } from './types.js';

// =============================================================================
// Shared Bodies
// =============================================================================

/**
 * Crashes `crashedLeaders` consecutive primaries at once and expects the
 * cluster to converge on `initialView + crashedLeaders`.
 */
export function singleViewChangeWithConsecutiveFailedPrimaries(crashedLeaders: number): ScenarioBody {
  return async (ctx) => {
    const initialView = await readClusterView(ctx);
    const initialPrimary = primaryOf(initialView, ctx.config.n);
    const toStop = FaultInjector.consecutivePrimaries(initialPrimary, crashedLeaders, ctx.config.n);
    const expectedFinalView = expectedViewAfterCrashes(initialView, crashedLeaders);

    await sendRandomWrites(ctx);

    await waitForView(
      ctx,
      initialPrimary,
      (v) => v === initialView,
      'Make sure we are in the initial view before crashing the primary',
    );
    ctx.enter('baseline_written');

    assertPlanKeepsQuorum(ctx, toStop);
    await FaultInjector.applyPlan(ctx.cluster, toStop, ctx.logger);
    ctx.enter('primary_crashed');

    ctx.enter('workload_injecting');
    await sendRandomWrites(ctx);

    await waitForViewOnRandomReplica(
      ctx,
      toStop,
      (v) => v === expectedFinalView,
      'Make sure view change has been triggered',
    );
    ctx.enter('view_converged');

    await waitForReadYourWrites(ctx);
    await runConcurrentOps(ctx, ctx.settings.concurrentOps);
    ctx.enter('post_convergence_verified');
  };
}

// =============================================================================
// Scenarios
// =============================================================================

/**
 * With only the primary down and a workload window shorter than the
 * view-change timeout, nothing may be committed.
 */
const requestNotWrittenPrimaryDown = defineScenario('request not written while primary down')
  .describe('Validate that no block is written when the primary fails')
  .withVerification(verifyViewMonotonicity)
  .body(async (ctx) => {
    const { workloadWindowMs, viewChangeTimeoutMs } = ctx.settings;
    if (workloadWindowMs >= viewChangeTimeoutMs) {
      throw new ConfigurationError(
        `Workload window of ${workloadWindowMs}ms must be shorter than ` +
          `the view-change timeout of ${viewChangeTimeoutMs}ms`,
      );
    }

    const initialView = await readClusterView(ctx);
    const initialPrimary = primaryOf(initialView, ctx.config.n);
    const expectedView = expectedViewAfterCrashes(initialView, 1);

    const baseline = await ctx.workload.issueOne(ctx.signal);
    await ctx.workload.assertWriteExecuted(baseline, ctx.signal);

    await waitForView(
      ctx,
      initialPrimary,
      (v) => v === initialView,
      'Make sure we are in the initial view before crashing the primary',
    );
    ctx.enter('baseline_written');

    const lastBlock = await readLastCommitted(ctx);

    assertPlanKeepsQuorum(ctx, [initialPrimary]);
    await FaultInjector.applyPlan(ctx.cluster, [initialPrimary], ctx.logger);
    ctx.enter('primary_crashed');

    ctx.enter('workload_injecting');
    await sendRandomWrites(ctx);

    await waitForViewOnRandomReplica(
      ctx,
      [initialPrimary],
      (v) => v === expectedView,
      'Make sure view change has been triggered',
    );
    ctx.enter('view_converged');

    const newLastBlock = await readLastCommitted(ctx);
    if (newLastBlock !== lastBlock) {
      throw new AssertionViolationError(
        'A block was committed while the primary was down',
        lastBlock,
        newLastBlock,
      );
    }
    ctx.enter('post_convergence_verified');
  });

/**
 * The most basic view change: only the primary is down.
 */
const singleViewChangeOnlyPrimaryDown = defineScenario('single view change, only primary down')
  .describe('Single view change when the primary replica is down')
  .withVerification(verifyLinearizability)
  .withVerification(verifyViewMonotonicity)
  .body(singleViewChangeWithConsecutiveFailedPrimaries(1));

/**
 * f replicas down, the primary among them, the next primary protected.
 */
const singleViewChangeWithFReplicasDown = defineScenario('single view change, f replicas down')
  .describe('Single view change with f replicas, including the primary, crashed')
  .withVerification(verifyLinearizability)
  .withVerification(verifyViewMonotonicity)
  .body(async (ctx) => {
    const { n, f } = ctx.config;

    const live = ctx.cluster.liveCount();
    if (live !== n) {
      throw new AssertionViolationError('Make sure all replicas are up initially', n, live);
    }

    const initialView = await readClusterView(ctx);
    const initialPrimary = primaryOf(initialView, n);
    const expectedView = expectedViewAfterCrashes(initialView, 1);
    const expectedNextPrimary = primaryOf(expectedView, n);
    ctx.enter('baseline_written');

    const plan = FaultInjector.planCrash(
      ctx.cluster.liveReplicas(),
      f,
      initialPrimary,
      [expectedNextPrimary],
      ctx.random,
    );
    assertPlanKeepsQuorum(ctx, plan);
    const crashed = await FaultInjector.applyPlan(ctx.cluster, plan, ctx.logger);
    if (crashed.has(expectedNextPrimary)) {
      throw new AssertionViolationError('The next primary must survive the crash', 'alive', 'crashed');
    }
    FaultInjector.assertQuorumAfterCrash(ctx.cluster);
    ctx.enter('primary_crashed');

    ctx.enter('workload_injecting');
    await sendRandomWrites(ctx);

    await waitForViewOnRandomReplica(
      ctx,
      crashed,
      (v) => v === expectedView,
      'Make sure view change has been triggered',
    );
    ctx.enter('view_converged');

    await waitForReadYourWrites(ctx);
    await runConcurrentOps(ctx, ctx.settings.concurrentOps);
    ctx.enter('post_convergence_verified');
  });

/**
 * A replica that missed a view change catches up once restarted. Needs
 * f >= 2: the primary and the lagging replica are down at the same time.
 */
const crashedReplicaCatchUpAfterViewChange = defineScenario('crashed replica catches up after view change')
  .describe('A replica that missed a view change works in the new view after restart')
  .selectConfigs((_n, f) => f >= 2)
  .withVerification(verifyLinearizability)
  .withVerification(verifyViewMonotonicity)
  .body(async (ctx) => {
    const initialView = await readClusterView(ctx);
    const initialPrimary = primaryOf(initialView, ctx.config.n);
    const expectedView = expectedViewAfterCrashes(initialView, 1);
    const expectedNextPrimary = primaryOf(expectedView, ctx.config.n);

    await runConcurrentOps(ctx, ctx.settings.warmupOps);

    const unstableReplica = pickRandom(
      ctx.cluster.allReplicas([initialPrimary, expectedNextPrimary]),
      ctx.random,
    );

    await waitForView(
      ctx,
      unstableReplica,
      (v) => v === initialView,
      'Make sure the unstable replica works in the initial view',
    );
    ctx.enter('baseline_written');

    ctx.logger.info(`Crash replica ${unstableReplica} before the view change`);
    const plan = [unstableReplica, initialPrimary];
    assertPlanKeepsQuorum(ctx, plan);
    await FaultInjector.applyPlan(ctx.cluster, [unstableReplica], ctx.logger);
    await FaultInjector.applyPlan(ctx.cluster, [initialPrimary], ctx.logger);
    ctx.enter('primary_crashed');

    ctx.enter('workload_injecting');
    await sendRandomWrites(ctx);

    await waitForViewOnRandomReplica(
      ctx,
      plan,
      (v) => v === expectedView,
      'Make sure view change has been triggered',
    );
    ctx.enter('view_converged');

    await settle(ctx, ctx.settings.settleAfterViewChangeMs, 'active window rebuild after view change');

    await startReplica(ctx, unstableReplica);
    await runConcurrentOps(ctx, ctx.settings.warmupOps);

    await waitForView(
      ctx,
      unstableReplica,
      (v) => v === expectedView,
      'Make sure the unstable replica works in the new view',
    );
    ctx.enter('post_convergence_verified');
  });

/**
 * A replica can be safely restarted after a view change.
 *
 * Restarted replicas are only required to reach at least the new view: they
 * may have moved further by the time they are observed.
 */
const restartReplicaAfterViewChange = defineScenario('restart replica after view change')
  .describe('Restart the former primary and a random replica after a view change')
  .withVerification(verifyLinearizability)
  .withVerification(verifyViewMonotonicity)
  .body(async (ctx) => {
    const initialView = await readClusterView(ctx);
    const initialPrimary = primaryOf(initialView, ctx.config.n);
    const expectedView = expectedViewAfterCrashes(initialView, 1);

    await runConcurrentOps(ctx, ctx.settings.warmupOps);
    ctx.enter('baseline_written');

    assertPlanKeepsQuorum(ctx, [initialPrimary]);
    await FaultInjector.applyPlan(ctx.cluster, [initialPrimary], ctx.logger);
    ctx.enter('primary_crashed');

    ctx.enter('workload_injecting');
    await sendRandomWrites(ctx);

    await waitForViewOnRandomReplica(
      ctx,
      [initialPrimary],
      (v) => v === expectedView,
      'Make sure a view change is triggered',
    );
    ctx.enter('view_converged');
    const currentPrimary = primaryOf(expectedView, ctx.config.n);

    await startReplica(ctx, initialPrimary);
    await settle(ctx, ctx.settings.settleAfterViewChangeMs, 'active window rebuild after view change');

    const unstableReplica = pickRandom(
      ctx.cluster.allReplicas([currentPrimary, initialPrimary]),
      ctx.random,
    );
    ctx.logger.info(`Restart replica ${unstableReplica} after the view change`);
    await ctx.cluster.stop(unstableReplica);
    await startReplica(ctx, unstableReplica);
    await settle(ctx, ctx.settings.settleAfterRestartMs, 'replica restart');

    await runConcurrentOps(ctx, ctx.settings.warmupOps);

    await waitForView(
      ctx,
      unstableReplica,
      (v) => v >= expectedView,
      'Make sure the unstable replica works in the new view',
    );
    await waitForView(
      ctx,
      initialPrimary,
      (v) => v >= expectedView,
      'Make sure the initial primary activates the new view',
    );
    ctx.enter('post_convergence_verified');
  });

/**
 * A sequence of view changes that keeps the slow commit path in use: each
 * round crashes c + 1 replicas including the primary. Needs c < f so that
 * n - (c + 1) >= 2f + 2c + 1.
 */
const multipleViewChangesSlowPath = defineScenario('multiple view changes on the slow path')
  .describe('Repeated view changes with c + 1 replicas down, slow path prevalent')
  .selectConfigs((_n, f, c) => c < f)
  .unstable()
  .withVerification(verifyLinearizability)
  .withVerification(verifyViewMonotonicity)
  .body(async (ctx) => {
    const { n, c } = ctx.config;
    let currentView = await readClusterView(ctx);

    for (let round = 0; round < 2; round++) {
      const live = ctx.cluster.liveCount();
      if (live !== n) {
        throw new AssertionViolationError('Make sure all replicas are up initially', n, live);
      }
      ctx.enter('baseline_written');

      const currentPrimary = primaryOf(currentView, n);
      const expectedNextPrimary = primaryOf(expectedViewAfterCrashes(currentView, 1), n);
      const plan = FaultInjector.planCrash(
        ctx.cluster.liveReplicas(),
        c + 1,
        currentPrimary,
        [expectedNextPrimary],
        ctx.random,
      );
      assertPlanKeepsQuorum(ctx, plan);
      const crashed = await FaultInjector.applyPlan(ctx.cluster, plan, ctx.logger);
      FaultInjector.assertQuorumAfterCrash(ctx.cluster);
      ctx.enter('primary_crashed');

      ctx.enter('workload_injecting');
      await sendRandomWrites(ctx);

      const minimumView = expectedViewAfterCrashes(currentView, 1);
      currentView = await waitForViewOnRandomReplica(
        ctx,
        crashed,
        (v) => v >= minimumView,
        'Make sure a view change has been triggered',
      );
      ctx.enter('view_converged');

      for (const id of crashed) {
        await startReplica(ctx, id);
      }
    }

    const finalPrimary: ReplicaId = primaryOf(currentView, n);

    await waitForReadYourWrites(ctx);
    await waitForView(ctx, finalPrimary, () => true, 'Make sure all ongoing view changes have completed');
    await waitForReadYourWrites(ctx);

    await ConvergencePoller.waitForSlowPathPrevalent(ctx.cluster, finalPrimary, {
      deadlineMs: ctx.settings.viewWaitDeadlineMs,
      perPollTimeoutMs: ctx.settings.perPollTimeoutMs,
      intervalMs: ctx.settings.statusPollIntervalMs,
      signal: ctx.signal,
      logger: ctx.logger,
    });
    ctx.enter('post_convergence_verified');
  });

/**
 * Skip view: the primary and the next primary are both down, so the first
 * view change cannot complete and the cluster moves to `v + 2`. Needs f >= 2.
 */
const skipViewCurrentAndNextPrimariesDown = defineScenario('skip view, current and next primaries down')
  .describe('Both the primary and the next primary fail; the cluster converges on v + 2')
  .selectConfigs((_n, f) => f >= 2)
  .withVerification(verifyLinearizability)
  .withVerification(verifyViewMonotonicity)
  .body(singleViewChangeWithConsecutiveFailedPrimaries(2));

/**
 * All named view-change scenarios.
 */
export const viewChangeScenarios = {
  requestNotWrittenPrimaryDown,
  singleViewChangeOnlyPrimaryDown,
  singleViewChangeWithFReplicasDown,
  crashedReplicaCatchUpAfterViewChange,
  restartReplicaAfterViewChange,
  multipleViewChangesSlowPath,
  skipViewCurrentAndNextPrimariesDown,
} as const;

export type ViewChangeScenarioName = keyof typeof viewChangeScenarios;

/**
 * Every scenario, in declaration order.
 */
export function listViewChangeScenarios(): readonly ScenarioDefinition[] {
  return Object.values(viewChangeScenarios);
}
