/**
 * bft-chaos - fault-injection orchestration for view-change testing of
 * Byzantine fault tolerant clusters.
 *
 * This module provides the public API of the library.
 */

export const VERSION = '0.1.0' as const;

// Core types
export type { ReplicaId, ViewNumber, ClusterConfig, ViewPredicate } from './core/types.js';
export {
  quorumSize,
  primaryOf,
  satisfiesQuorumPrecondition,
  expectedViewAfterCrashes,
  DEFAULTS,
} from './core/types.js';

// Error classes
export type { ErrorKind } from './core/errors.js';
export {
  ScenarioError,
  TransientObservationError,
  PollAttemptTimeoutError,
  ConvergenceTimeoutError,
  DeadlineExceededError,
  ConfigurationError,
  InsufficientCrashCandidatesError,
  ReplicaAlreadyRunningError,
  UnknownReplicaError,
  WorkloadHandleReusedError,
  AssertionViolationError,
  QuorumViolationError,
  isTransientError,
  classifyError,
  toError,
} from './core/errors.js';

// Deadlines and cancellation
export type { ScopeResult } from './core/deadline.js';
export { delay, moveOnAfter, withTimeout, failAfter, linkedController } from './core/deadline.js';

// Randomness
export type { RandomSource } from './core/random.js';
export { defaultRandom, createSeededRandom, randomInt, shuffle, pickRandom } from './core/random.js';

// Settings and logging
export type { HarnessSettings } from './core/settings.js';
export { resolveSettings, settingsFromEnv, ENV_PREFIX } from './core/settings.js';
export type { Logger, LogLevel, LoggerOptions } from './core/logger.js';
export { createLogger, silentLogger } from './core/logger.js';

// Cluster control
export type {
  ClusterController,
  ClusterControllerEvents,
  ReplicaCommand,
  ReplicaInfo,
  ReplicaIntrospector,
  ReplicaStatus,
} from './cluster/types.js';
export type { ProcessClusterOptions, ReplicaProcess, SpawnReplica } from './cluster/process-cluster.js';
export { ProcessClusterController, spawnChildReplica } from './cluster/process-cluster.js';

// Convergence polling
export type { PollOptions, PollQuery, ViewWaitOptions } from './poller/convergence-poller.js';
export { ConvergencePoller } from './poller/convergence-poller.js';
export type { ViewRegression } from './poller/view-observer.js';
export { ViewObserver } from './poller/view-observer.js';

// Fault injection
export type { CrashPlan, CrashRequest } from './fault/fault-injector.js';
export { FaultInjector } from './fault/fault-injector.js';

// Workload
export type {
  KvClient,
  LinearizabilityTracker,
  KeyValue,
  WorkloadState,
  FailureCounts,
  WorkloadReport,
  WorkloadRecorder,
} from './workload/types.js';
export type { WorkloadRunner } from './workload/workload-handle.js';
export { WorkloadHandle } from './workload/workload-handle.js';
export type { WorkloadGeneratorOptions, ReadYourWritesOptions } from './workload/workload-generator.js';
export { WorkloadGenerator } from './workload/workload-generator.js';

// Scenarios
export type {
  ScenarioPhase,
  PhaseTransition,
  ScenarioContext,
  SetupStage,
  VerificationWrapper,
  ScenarioBody,
  ConfigSelector,
  ScenarioDefinition,
  ScenarioEnvironment,
  ScenarioStatus,
  ScenarioResult,
  ScenarioRunnerEvents,
} from './scenario/types.js';
export {
  ScenarioBuilder,
  defineScenario,
  startAllReplicas,
  verifyLinearizability,
  verifyViewMonotonicity,
  composeVerifications,
} from './scenario/builder.js';
export { ScenarioRunner, PhaseTracker } from './scenario/runner.js';
export * as steps from './scenario/steps.js';
export type { ViewChangeScenarioName } from './scenario/view-change-scenarios.js';
export {
  viewChangeScenarios,
  listViewChangeScenarios,
  singleViewChangeWithConsecutiveFailedPrimaries,
} from './scenario/view-change-scenarios.js';
