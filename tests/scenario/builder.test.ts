import { describe, it, expect } from 'vitest';
import {
  composeVerifications,
  defineScenario,
  startAllReplicas,
  verifyLinearizability,
  verifyViewMonotonicity,
} from '../../src/scenario/builder.js';
import type { SetupStage, VerificationWrapper } from '../../src/scenario/types.js';
import { createTestContext } from '../helpers/context.js';
import { SimulatedCluster } from '../helpers/simulated-cluster.js';

describe('defineScenario', () => {
  it('should build a frozen definition with defaults', () => {
    const body = async (): Promise<void> => undefined;
    const definition = defineScenario('basic').body(body);

    expect(definition.name).toBe('basic');
    expect(definition.description).toBe('');
    expect(definition.unstable).toBe(false);
    expect(definition.setup).toEqual([startAllReplicas]);
    expect(definition.verifications).toEqual([]);
    expect(definition.requiresTracker).toBe(false);
    expect(definition.body).toBe(body);
    expect(definition.selectConfigs(4, 1, 0)).toBe(true);
    expect(Object.isFrozen(definition)).toBe(true);
  });

  it('should carry every builder option', () => {
    const setup: SetupStage = async () => undefined;
    const definition = defineScenario('skip view')
      .describe('Two primaries down')
      .selectConfigs((_n, f) => f >= 2)
      .unstable()
      .withSetup(setup)
      .withVerification(verifyLinearizability)
      .body(async () => undefined);

    expect(definition.description).toBe('Two primaries down');
    expect(definition.unstable).toBe(true);
    expect(definition.setup).toEqual([setup]);
    expect(definition.verifications).toEqual([verifyLinearizability]);
    expect(definition.requiresTracker).toBe(true);
    expect(definition.selectConfigs(4, 1, 0)).toBe(false);
    expect(definition.selectConfigs(7, 2, 0)).toBe(true);
  });
});

describe('composeVerifications', () => {
  it('should nest wrappers with the first one outermost', async () => {
    const order: string[] = [];
    const wrapper =
      (name: string): VerificationWrapper =>
      async (_ctx, next) => {
        order.push(`${name}:before`);
        await next();
        order.push(`${name}:after`);
      };

    const composed = composeVerifications([wrapper('outer'), wrapper('inner')], async () => {
      order.push('body');
    });
    await composed(createTestContext().ctx);

    expect(order).toEqual(['outer:before', 'inner:before', 'body', 'inner:after', 'outer:after']);
  });

  it('should skip the post-checks when the body fails', async () => {
    const after: string[] = [];
    const wrapper: VerificationWrapper = async (_ctx, next) => {
      await next();
      after.push('checked');
    };

    const composed = composeVerifications([wrapper], async () => {
      throw new Error('body failed');
    });

    await expect(composed(createTestContext().ctx)).rejects.toThrow('body failed');
    expect(after).toEqual([]);
  });
});

describe('built-in stages', () => {
  it('should start every replica and enter all_up', async () => {
    const cluster = new SimulatedCluster({ config: { n: 4, f: 1, c: 0 } });
    const { ctx, phases } = createTestContext(cluster);

    await startAllReplicas(ctx);

    expect(cluster.liveCount()).toBe(4);
    expect(phases).toEqual(['all_up']);
  });

  it('should verify the tracker history after the body', async () => {
    const cluster = new SimulatedCluster({ config: { n: 4, f: 1, c: 0 } });
    await cluster.startAll();
    const { ctx } = createTestContext(cluster);

    await expect(
      verifyLinearizability(ctx, async () => {
        await cluster.runConcurrentOps(2);
        cluster.loseWrite('tracked-1');
      }),
    ).rejects.toThrow("Acknowledged write of 'tracked-1' was lost");
  });

  it('should require a tracker', async () => {
    const { ctx } = createTestContext();
    const untracked = { ...ctx, tracker: undefined };

    await expect(verifyLinearizability(untracked, async () => undefined)).rejects.toThrow(
      "Scenario 'test' requires a linearizability tracker",
    );
  });

  it('should fail on a view regression', async () => {
    const { ctx } = createTestContext();

    await expect(
      verifyViewMonotonicity(ctx, async () => {
        ctx.observer.record(1, 2);
        ctx.observer.record(1, 1);
      }),
    ).rejects.toThrow('View regressed on replica 1');
  });
});
