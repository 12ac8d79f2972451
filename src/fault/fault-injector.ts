/**
 * FaultInjector - crash plan selection and application.
 *
 * Stateless: every call plans from the live replica set it is given and
 * applies the plan through the cluster controller. Quorum safety after a
 * crash is checked separately by `assertQuorumAfterCrash`, because only the
 * scenario knows which progress it expects.
 *
 * @module fault/fault-injector
 */

import type { ClusterController } from '../cluster/types.js';
import {
  ConfigurationError,
  InsufficientCrashCandidatesError,
  QuorumViolationError,
} from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { defaultRandom, shuffle, type RandomSource } from '../core/random.js';
import { quorumSize, type ReplicaId } from '../core/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Ordered replicas to stop; the primary always comes first.
 */
export type CrashPlan = readonly ReplicaId[];

/**
 * Parameters of a crash that includes the current primary.
 */
export interface CrashRequest {
  /** Total number of replicas to crash, primary included. */
  readonly crashCount: number;
  readonly primary: ReplicaId;
  /** Replicas that must survive, typically the expected next primary. */
  readonly protected?: Iterable<ReplicaId>;
  readonly random?: RandomSource;
  readonly logger?: Logger;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Selects which replicas to crash.
 *
 * The primary is always included. The remaining `crashCount - 1` members are
 * drawn uniformly without replacement from `live - protected - {primary}`.
 *
 * @throws {ConfigurationError} If `crashCount < 1` or the primary is protected
 * @throws {InsufficientCrashCandidatesError} If the candidate pool is too small
 */
function planCrash(
  liveReplicas: readonly ReplicaId[],
  crashCount: number,
  primary: ReplicaId,
  protectedReplicas: Iterable<ReplicaId> = [],
  random: RandomSource = defaultRandom,
): CrashPlan {
  if (!Number.isInteger(crashCount) || crashCount < 1) {
    throw new ConfigurationError(`crashCount must be a positive integer, got ${crashCount}`);
  }

  const excluded = new Set(protectedReplicas);
  if (excluded.has(primary)) {
    throw new ConfigurationError(`Primary ${primary} cannot be protected from crashing`);
  }
  excluded.add(primary);

  const candidates = liveReplicas.filter((id) => !excluded.has(id));
  if (candidates.length < crashCount - 1) {
    throw new InsufficientCrashCandidatesError(crashCount, candidates.length);
  }

  return [primary, ...shuffle(candidates, random).slice(0, crashCount - 1)];
}

/**
 * Replicas that are primaries of `count` consecutive views starting with
 * `startPrimary`.
 */
function consecutivePrimaries(startPrimary: ReplicaId, count: number, n: number): CrashPlan {
  if (!Number.isInteger(count) || count < 1 || count > n) {
    throw new ConfigurationError(`Cannot take ${count} consecutive primaries in a cluster of ${n}`);
  }
  return Array.from({ length: count }, (_, i) => (startPrimary + i) % n);
}

// =============================================================================
// Application
// =============================================================================

/**
 * Stops every replica of a plan. Crashes are simultaneous from the protocol's
 * point of view, so the stops run concurrently.
 */
async function applyPlan(
  cluster: ClusterController,
  plan: CrashPlan,
  logger: Logger = silentLogger(),
): Promise<Set<ReplicaId>> {
  await Promise.all(plan.map((id) => cluster.stop(id)));
  logger.info(`Crashed replicas [${plan.join(', ')}]`, { crashed: [...plan] });
  return new Set(plan);
}

/**
 * FaultInjector facade.
 *
 * @example
 * ```typescript
 * const crashed = await FaultInjector.crashIncludingPrimary(cluster, {
 *   crashCount: config.f,
 *   primary: 0,
 *   protected: [1],
 *   random: createSeededRandom(7),
 * });
 * FaultInjector.assertQuorumAfterCrash(cluster);
 * ```
 */
export const FaultInjector = {
  planCrash,
  consecutivePrimaries,
  applyPlan,

  /**
   * Plans and applies a crash that includes the primary.
   *
   * @returns The crashed replicas
   */
  async crashIncludingPrimary(
    cluster: ClusterController,
    request: CrashRequest,
  ): Promise<Set<ReplicaId>> {
    const plan = planCrash(
      cluster.liveReplicas(),
      request.crashCount,
      request.primary,
      request.protected,
      request.random,
    );
    return applyPlan(cluster, plan, request.logger);
  },

  /**
   * Crashes `count` consecutive primaries starting with `startPrimary`.
   *
   * @returns The crashed replicas, in leadership order
   */
  async crashConsecutivePrimaries(
    cluster: ClusterController,
    startPrimary: ReplicaId,
    count: number,
    logger?: Logger,
  ): Promise<CrashPlan> {
    const plan = consecutivePrimaries(startPrimary, count, cluster.config.n);
    await applyPlan(cluster, plan, logger);
    return plan;
  },

  /**
   * Restarts previously crashed replicas, one at a time.
   */
  async restore(cluster: ClusterController, replicas: Iterable<ReplicaId>): Promise<void> {
    for (const id of replicas) {
      await cluster.start(id);
    }
  },

  /**
   * Checks that enough replicas remain live for a view change.
   *
   * @throws {QuorumViolationError} If `liveCount < 2f + 2c + 1`
   */
  assertQuorumAfterCrash(cluster: ClusterController): void {
    const required = quorumSize(cluster.config);
    const live = cluster.liveCount();
    if (live < required) {
      throw new QuorumViolationError(required, live);
    }
  },
} as const;
