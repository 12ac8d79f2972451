/**
 * ScenarioRunner - executes scenario definitions against a cluster.
 *
 * A run is exclusive use of the cluster: the runner refuses to start a
 * second run while one is in progress. Every workload started during a run
 * is cancelled and joined before the result is produced.
 *
 * @module scenario/runner
 */

import { EventEmitter } from 'node:events';
import { ConfigurationError, toError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { createSeededRandom, defaultRandom, type RandomSource } from '../core/random.js';
import { satisfiesQuorumPrecondition } from '../core/types.js';
import { ViewObserver } from '../poller/view-observer.js';
import { WorkloadGenerator } from '../workload/workload-generator.js';
import { composeVerifications } from './builder.js';
import type {
  PhaseTransition,
  ScenarioContext,
  ScenarioDefinition,
  ScenarioEnvironment,
  ScenarioPhase,
  ScenarioResult,
  ScenarioRunnerEvents,
} from './types.js';

/**
 * Records phase transitions of one run.
 */
export class PhaseTracker {
  private readonly transitions: PhaseTransition[] = [];

  constructor(private readonly startedAt: number = Date.now()) {}

  get current(): ScenarioPhase | undefined {
    return this.transitions[this.transitions.length - 1]?.phase;
  }

  /**
   * @throws {Error} If the run has already failed
   */
  enter(phase: ScenarioPhase): void {
    if (this.current === 'failed') {
      throw new Error(`Cannot enter phase '${phase}' after the scenario failed`);
    }
    this.transitions.push({ phase, atMs: Date.now() - this.startedAt });
  }

  history(): readonly PhaseTransition[] {
    return [...this.transitions];
  }
}

/**
 * Runs scenarios one at a time.
 *
 * @example
 * ```typescript
 * const runner = new ScenarioRunner({ cluster, client, tracker, settings });
 * runner.on('phase', (name, phase) => console.log(`${name}: ${phase}`));
 *
 * const result = await runner.run(viewChangeScenarios.singleViewChangeOnlyPrimaryDown);
 * ```
 */
export class ScenarioRunner extends EventEmitter<ScenarioRunnerEvents> {
  private readonly env: ScenarioEnvironment;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private running = false;

  constructor(env: ScenarioEnvironment) {
    super();
    this.env = env;
    this.logger = env.logger ?? silentLogger();
    this.random =
      env.random ??
      (env.settings.seed !== undefined ? createSeededRandom(env.settings.seed) : defaultRandom);
  }

  /**
   * Runs a scenario and reports its outcome. Failures of the scenario are
   * reported in the result; configuration errors about the cluster itself
   * are thrown before anything is attempted.
   *
   * @throws {ConfigurationError} If the cluster violates `n >= 3f + 2c + 1`,
   *   the scenario needs a tracker the environment lacks, or another run is
   *   in progress
   */
  async run(definition: ScenarioDefinition): Promise<ScenarioResult> {
    const config = this.env.cluster.config;

    if (!satisfiesQuorumPrecondition(config)) {
      throw new ConfigurationError(
        `Cluster (n=${config.n}, f=${config.f}, c=${config.c}) violates n >= 3f + 2c + 1`,
      );
    }
    if (this.running) {
      throw new ConfigurationError(
        `Cannot run '${definition.name}': another scenario is using the cluster`,
      );
    }

    if (!definition.selectConfigs(config.n, config.f, config.c)) {
      return this.skip(definition, `not selected for n=${config.n}, f=${config.f}, c=${config.c}`);
    }
    if (definition.unstable && !this.env.includeUnstable) {
      return this.skip(definition, 'marked unstable');
    }
    if (definition.requiresTracker && !this.env.tracker) {
      throw new ConfigurationError(`Scenario '${definition.name}' requires a linearizability tracker`);
    }

    this.running = true;
    try {
      return await this.execute(definition);
    } finally {
      this.running = false;
    }
  }

  /**
   * Runs a scenario and throws its error if it failed.
   */
  async runOrThrow(definition: ScenarioDefinition): Promise<ScenarioResult> {
    const result = await this.run(definition);
    if (result.error) {
      throw result.error;
    }
    return result;
  }

  private async execute(definition: ScenarioDefinition): Promise<ScenarioResult> {
    const startedAt = Date.now();
    const phases = new PhaseTracker(startedAt);
    const controller = new AbortController();
    const logger = this.logger.child({ scenario: definition.name });

    const workload = new WorkloadGenerator({
      client: this.env.client,
      random: this.random,
      logger,
      ...(this.env.tracker !== undefined ? { tracker: this.env.tracker } : {}),
    });

    const ctx: ScenarioContext = {
      name: definition.name,
      cluster: this.env.cluster,
      config: this.env.cluster.config,
      workload,
      tracker: this.env.tracker,
      settings: this.env.settings,
      random: this.random,
      logger,
      observer: new ViewObserver(),
      signal: controller.signal,
      enter: (phase) => {
        phases.enter(phase);
        logger.info(`Entered phase ${phase}`);
        this.emit('phase', definition.name, phase);
      },
    };

    this.emit('scenarioStart', definition.name);
    logger.info(`Starting scenario: ${definition.description || definition.name}`);

    let error: Error | undefined;
    try {
      for (const stage of definition.setup) {
        await stage(ctx);
      }
      await composeVerifications(definition.verifications, definition.body)(ctx);
    } catch (caught) {
      error = toError(caught);
    }

    controller.abort();
    try {
      await workload.drain();
    } catch (caught) {
      error ??= toError(caught);
    }

    if (error) {
      phases.enter('failed');
      this.emit('phase', definition.name, 'failed');
      logger.error(`Scenario failed: ${error.message}`, { error: error.name });
    } else {
      logger.info('Scenario passed');
    }

    const result: ScenarioResult = {
      name: definition.name,
      status: error ? 'failed' : 'passed',
      phases: phases.history(),
      durationMs: Date.now() - startedAt,
      ...(error ? { error } : {}),
    };

    this.emit('scenarioEnd', result);
    return result;
  }

  private skip(definition: ScenarioDefinition, reason: string): ScenarioResult {
    this.logger.info(`Skipping scenario '${definition.name}': ${reason}`);
    const result: ScenarioResult = {
      name: definition.name,
      status: 'skipped',
      phases: [],
      durationMs: 0,
      skipReason: reason,
    };
    this.emit('scenarioEnd', result);
    return result;
  }
}
