import { silentLogger } from '../../src/core/logger.js';
import { createSeededRandom } from '../../src/core/random.js';
import { resolveSettings } from '../../src/core/settings.js';
import { ViewObserver } from '../../src/poller/view-observer.js';
import type { ScenarioContext, ScenarioPhase } from '../../src/scenario/types.js';
import { WorkloadGenerator } from '../../src/workload/workload-generator.js';
import { FAST_SETTINGS, SimulatedCluster } from './simulated-cluster.js';

/**
 * Scenario context over a simulated cluster, recording entered phases.
 */
export function createTestContext(
  cluster: SimulatedCluster = new SimulatedCluster({ config: { n: 4, f: 1, c: 0 } }),
  signal: AbortSignal = new AbortController().signal,
): { readonly ctx: ScenarioContext; readonly phases: ScenarioPhase[] } {
  const phases: ScenarioPhase[] = [];
  const random = createSeededRandom(1);
  const ctx: ScenarioContext = {
    name: 'test',
    cluster,
    config: cluster.config,
    workload: new WorkloadGenerator({ client: cluster, tracker: cluster, random }),
    tracker: cluster,
    settings: resolveSettings(FAST_SETTINGS),
    random,
    logger: silentLogger(),
    observer: new ViewObserver(),
    signal,
    enter: (phase) => {
      phases.push(phase);
    },
  };
  return { ctx, phases };
}
