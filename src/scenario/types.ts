/**
 * Type definitions for scenario composition and execution.
 */

import type { ClusterController } from '../cluster/types.js';
import type { Logger } from '../core/logger.js';
import type { RandomSource } from '../core/random.js';
import type { HarnessSettings } from '../core/settings.js';
import type { ClusterConfig } from '../core/types.js';
import type { ViewObserver } from '../poller/view-observer.js';
import type { KvClient, LinearizabilityTracker } from '../workload/types.js';
import type { WorkloadGenerator } from '../workload/workload-generator.js';

/**
 * Phases of a view-change scenario.
 *
 * The canonical single view change walks `all_up -> baseline_written ->
 * primary_crashed -> workload_injecting -> view_converged ->
 * post_convergence_verified`. Multi-step scenarios revisit phases; `failed`
 * and `post_convergence_verified` at the end of a run are terminal.
 */
export type ScenarioPhase =
  | 'all_up'
  | 'baseline_written'
  | 'primary_crashed'
  | 'workload_injecting'
  | 'view_converged'
  | 'post_convergence_verified'
  | 'failed';

/**
 * A recorded phase transition.
 */
export interface PhaseTransition {
  readonly phase: ScenarioPhase;
  /** Milliseconds since the scenario started. */
  readonly atMs: number;
}

/**
 * Everything a scenario body may use. Valid for one run only.
 */
export interface ScenarioContext {
  readonly name: string;
  readonly cluster: ClusterController;
  readonly config: ClusterConfig;
  readonly workload: WorkloadGenerator;
  readonly tracker: LinearizabilityTracker | undefined;
  readonly settings: HarnessSettings;
  readonly random: RandomSource;
  readonly logger: Logger;
  readonly observer: ViewObserver;
  /** Aborted when the run ends or is cancelled. */
  readonly signal: AbortSignal;
  /** Records entry into a phase. */
  enter(phase: ScenarioPhase): void;
}

/**
 * Prepares the cluster before the body runs.
 */
export type SetupStage = (ctx: ScenarioContext) => Promise<void>;

/**
 * Wraps the body with additional checks. Must call `next` exactly once.
 */
export type VerificationWrapper = (ctx: ScenarioContext, next: () => Promise<void>) => Promise<void>;

/**
 * The scenario itself.
 */
export type ScenarioBody = (ctx: ScenarioContext) => Promise<void>;

/**
 * Filters the cluster configurations a scenario supports.
 */
export type ConfigSelector = (n: number, f: number, c: number) => boolean;

/**
 * A fully built scenario.
 */
export interface ScenarioDefinition {
  readonly name: string;
  readonly description: string;
  readonly selectConfigs: ConfigSelector;
  /** Known to be unreliable; skipped unless explicitly included. */
  readonly unstable: boolean;
  readonly setup: readonly SetupStage[];
  readonly verifications: readonly VerificationWrapper[];
  /** Whether the run needs a linearizability tracker. */
  readonly requiresTracker: boolean;
  readonly body: ScenarioBody;
}

/**
 * Collaborators and settings a run is executed against.
 */
export interface ScenarioEnvironment {
  readonly cluster: ClusterController;
  readonly client: KvClient;
  readonly tracker?: LinearizabilityTracker;
  readonly settings: HarnessSettings;
  /** Default: seeded from `settings.seed`, otherwise ambient randomness. */
  readonly random?: RandomSource;
  readonly logger?: Logger;
  /** Run scenarios marked unstable. Default: false. */
  readonly includeUnstable?: boolean;
}

export type ScenarioStatus = 'passed' | 'failed' | 'skipped';

/**
 * Outcome of a run.
 */
export interface ScenarioResult {
  readonly name: string;
  readonly status: ScenarioStatus;
  readonly phases: readonly PhaseTransition[];
  readonly durationMs: number;
  readonly error?: Error;
  readonly skipReason?: string;
}

/**
 * Events emitted by ScenarioRunner.
 */
export interface ScenarioRunnerEvents {
  scenarioStart: [name: string];
  phase: [name: string, phase: ScenarioPhase];
  scenarioEnd: [result: ScenarioResult];
}
