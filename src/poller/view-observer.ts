/**
 * Records views observed on each replica during a scenario run.
 *
 * A replica that stays up must never report a lower view than it reported
 * before. Restarting a replica starts a new observation epoch for it, since a
 * freshly started process may report its initial view until it catches up.
 */

import { AssertionViolationError } from '../core/errors.js';
import type { ReplicaId, ViewNumber } from '../core/types.js';

export interface ViewRegression {
  readonly replicaId: ReplicaId;
  readonly previous: ViewNumber;
  readonly observed: ViewNumber;
}

export class ViewObserver {
  private readonly history: Map<ReplicaId, ViewNumber[]> = new Map();
  private readonly regressions: ViewRegression[] = [];

  record(replicaId: ReplicaId, view: ViewNumber): void {
    let views = this.history.get(replicaId);
    if (!views) {
      views = [];
      this.history.set(replicaId, views);
    }

    const previous = views[views.length - 1];
    if (previous !== undefined && view < previous) {
      this.regressions.push({ replicaId, previous, observed: view });
    }
    views.push(view);
  }

  /**
   * Forgets the history of a replica, e.g. after it has been restarted.
   */
  reset(replicaId: ReplicaId): void {
    this.history.delete(replicaId);
  }

  viewsOf(replicaId: ReplicaId): readonly ViewNumber[] {
    return this.history.get(replicaId) ?? [];
  }

  getRegressions(): readonly ViewRegression[] {
    return this.regressions;
  }

  /**
   * @throws {AssertionViolationError} If any replica reported a lower view
   */
  assertMonotonic(): void {
    const first = this.regressions[0];
    if (first) {
      throw new AssertionViolationError(
        `View regressed on replica ${first.replicaId}`,
        `>= ${first.previous}`,
        first.observed,
      );
    }
  }
}
