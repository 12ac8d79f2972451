/**
 * Scenario builder.
 *
 * A scenario is assembled from independent stages: cluster setup,
 * verification wrappers around the body, and the body itself.
 *
 * @example
 * ```typescript
 * const scenario = defineScenario('single view change')
 *   .describe('Crash the primary and wait for view 1')
 *   .selectConfigs((n, f) => f >= 1)
 *   .withVerification(verifyLinearizability)
 *   .body(async (ctx) => {
 *     await ctx.cluster.stop(0);
 *     // ...
 *   });
 * ```
 */

import { ConfigurationError } from '../core/errors.js';
import { waitForAllReplicas } from './steps.js';
import type {
  ConfigSelector,
  ScenarioBody,
  ScenarioContext,
  ScenarioDefinition,
  SetupStage,
  VerificationWrapper,
} from './types.js';

// =============================================================================
// Stages
// =============================================================================

/**
 * Starts every replica, waits until each one reports a view and enters
 * `all_up`.
 */
export const startAllReplicas: SetupStage = async (ctx) => {
  await ctx.cluster.startAll();
  await waitForAllReplicas(ctx);
  ctx.enter('all_up');
};

/**
 * Checks the tracker's history after the body succeeds.
 *
 * @throws {ConfigurationError} If the environment has no tracker
 */
export const verifyLinearizability: VerificationWrapper = async (ctx, next) => {
  const tracker = ctx.tracker;
  if (!tracker) {
    throw new ConfigurationError(`Scenario '${ctx.name}' requires a linearizability tracker`);
  }
  await next();
  await tracker.verify();
};

/**
 * Checks that no replica reported a decreasing view during the body.
 */
export const verifyViewMonotonicity: VerificationWrapper = async (ctx, next) => {
  await next();
  ctx.observer.assertMonotonic();
};

/**
 * Applies wrappers around a body, first wrapper outermost.
 */
export function composeVerifications(
  wrappers: readonly VerificationWrapper[],
  body: ScenarioBody,
): ScenarioBody {
  return wrappers.reduceRight<ScenarioBody>(
    (inner, wrapper) => (ctx: ScenarioContext) => wrapper(ctx, () => inner(ctx)),
    body,
  );
}

// =============================================================================
// Builder
// =============================================================================

export class ScenarioBuilder {
  private description = '';
  private selector: ConfigSelector = () => true;
  private isUnstable = false;
  private readonly setupStages: SetupStage[] = [];
  private readonly wrappers: VerificationWrapper[] = [];

  constructor(private readonly name: string) {}

  describe(description: string): this {
    this.description = description;
    return this;
  }

  /**
   * Restricts the configurations the scenario runs on.
   */
  selectConfigs(selector: ConfigSelector): this {
    this.selector = selector;
    return this;
  }

  /**
   * Marks the scenario as unreliable.
   */
  unstable(): this {
    this.isUnstable = true;
    return this;
  }

  /**
   * Adds a setup stage. Without any, `startAllReplicas` is used.
   */
  withSetup(stage: SetupStage): this {
    this.setupStages.push(stage);
    return this;
  }

  withVerification(wrapper: VerificationWrapper): this {
    this.wrappers.push(wrapper);
    return this;
  }

  body(body: ScenarioBody): ScenarioDefinition {
    return Object.freeze({
      name: this.name,
      description: this.description,
      selectConfigs: this.selector,
      unstable: this.isUnstable,
      setup: this.setupStages.length > 0 ? [...this.setupStages] : [startAllReplicas],
      verifications: [...this.wrappers],
      requiresTracker: this.wrappers.includes(verifyLinearizability),
      body,
    });
  }
}

/**
 * Starts building a scenario.
 */
export function defineScenario(name: string): ScenarioBuilder {
  return new ScenarioBuilder(name);
}
