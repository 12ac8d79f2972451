/**
 * Reusable scenario steps.
 *
 * Each step reads its timings from the run's settings and honours the run's
 * cancellation signal.
 */

import type { ScenarioContext } from './types.js';
import { ConfigurationError } from '../core/errors.js';
import { delay } from '../core/deadline.js';
import { pickRandom } from '../core/random.js';
import { quorumSize, type ReplicaId, type ViewNumber, type ViewPredicate } from '../core/types.js';
import type { CrashPlan } from '../fault/fault-injector.js';
import { ConvergencePoller, type PollOptions } from '../poller/convergence-poller.js';
import type { WorkloadReport } from '../workload/types.js';

function pollOptions<T>(ctx: ScenarioContext, message: string): PollOptions<T> {
  return {
    message,
    deadlineMs: ctx.settings.viewWaitDeadlineMs,
    perPollTimeoutMs: ctx.settings.perPollTimeoutMs,
    intervalMs: ctx.settings.statusPollIntervalMs,
    signal: ctx.signal,
    logger: ctx.logger,
  };
}

/**
 * Injects writes for the configured workload window.
 */
export function sendRandomWrites(ctx: ScenarioContext): Promise<WorkloadReport> {
  return ctx.workload.runBounded(
    ctx.settings.workloadWindowMs,
    ctx.settings.workloadIntensity,
    ctx.signal,
  );
}

/**
 * Waits until `replicaId` reports a view satisfying `expected`.
 */
export function waitForView(
  ctx: ScenarioContext,
  replicaId: ReplicaId,
  expected: ViewPredicate,
  message: string,
): Promise<ViewNumber> {
  return ConvergencePoller.waitForView(ctx.cluster, replicaId, expected, {
    ...pollOptions<ViewNumber>(ctx, message),
    observer: ctx.observer,
  });
}

/**
 * Reads the view the cluster is in, retrying while replicas cannot answer.
 */
export function readClusterView(ctx: ScenarioContext): Promise<ViewNumber> {
  return ConvergencePoller.retryUntil(
    (signal) => ctx.cluster.clusterView(signal),
    pollOptions<ViewNumber>(ctx, 'Make sure the cluster reports its view'),
  );
}

/**
 * Reads the last committed block marker, retrying while the cluster cannot
 * answer.
 */
export function readLastCommitted(ctx: ScenarioContext): Promise<number> {
  return ConvergencePoller.retryUntil(
    (signal) => ctx.workload.readLastCommitted(signal),
    pollOptions<number>(ctx, 'Make sure the last committed block can be read'),
  );
}

/**
 * Waits until every replica is live and reports a view.
 */
export async function waitForAllReplicas(ctx: ScenarioContext): Promise<void> {
  const live = ctx.cluster.liveCount();
  if (live !== ctx.config.n) {
    throw new ConfigurationError(`Only ${live} of ${ctx.config.n} replicas were started`);
  }
  for (const replicaId of ctx.cluster.allReplicas()) {
    await waitForView(ctx, replicaId, () => true, `Make sure replica ${replicaId} is up`);
  }
}

/**
 * Waits for `expected` on a replica drawn at random among those not in
 * `without`.
 */
export function waitForViewOnRandomReplica(
  ctx: ScenarioContext,
  without: Iterable<ReplicaId>,
  expected: ViewPredicate,
  message: string,
): Promise<ViewNumber> {
  const replicaId = pickRandom(ctx.cluster.allReplicas(without), ctx.random);
  ctx.logger.debug(`Observing view on replica ${replicaId}`);
  return waitForView(ctx, replicaId, expected, message);
}

/**
 * Retries read-your-writes until it succeeds within the configured deadline.
 */
export function waitForReadYourWrites(ctx: ScenarioContext): Promise<void> {
  return ctx.workload.confirmReadYourWrites({
    deadlineMs: ctx.settings.readYourWritesDeadlineMs,
    attemptTimeoutMs: ctx.settings.readYourWritesAttemptTimeoutMs,
    intervalMs: ctx.settings.statusPollIntervalMs,
    signal: ctx.signal,
  });
}

/**
 * Runs the configured batch of concurrent operations.
 */
export function runConcurrentOps(ctx: ScenarioContext, count: number): Promise<void> {
  return ctx.workload.runConcurrentOps(count, Math.max(1, ctx.settings.workloadIntensity), ctx.signal);
}

/**
 * Observes a fixed settling delay, e.g. while the active window is rebuilt
 * after a view change.
 */
export async function settle(ctx: ScenarioContext, ms: number, reason: string): Promise<void> {
  ctx.logger.info(`Settling for ${ms}ms: ${reason}`);
  await delay(ms, ctx.signal);
}

/**
 * Starts a replica and begins a new view observation epoch for it.
 */
export async function startReplica(ctx: ScenarioContext, replicaId: ReplicaId): Promise<void> {
  await ctx.cluster.start(replicaId);
  ctx.observer.reset(replicaId);
}

/**
 * Checks, before acting, that crashing `plan` leaves a quorum for progress.
 *
 * @throws {ConfigurationError} If the crash would leave fewer than `2f + 2c + 1` live replicas
 */
export function assertPlanKeepsQuorum(ctx: ScenarioContext, plan: CrashPlan): void {
  const planned = new Set(plan);
  const remaining = ctx.cluster.liveReplicas().filter((id) => !planned.has(id)).length;
  const required = quorumSize(ctx.config);
  if (remaining < required) {
    throw new ConfigurationError(
      `Crashing [${plan.join(', ')}] leaves ${remaining} live replicas, ` +
        `fewer than the ${required} required for a view change`,
    );
  }
}
