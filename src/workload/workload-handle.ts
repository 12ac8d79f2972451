/**
 * In-flight, cancellable batch of client operations.
 *
 * Lifecycle: `created -> running -> cancelled | completed`. A handle runs
 * once; `join()` waits until every in-flight operation has settled, so a
 * cancelled window never leaks work into the next scenario phase.
 *
 * Operations still in flight when the window closes fail naturally: whatever
 * the runner rejects with after cancellation is counted as a failure. Before
 * cancellation only transient rejections are counted; anything else is
 * rethrown from `join()`.
 */

import { WorkloadHandleReusedError, classifyError, isTransientError } from '../core/errors.js';
import { isAbortError, linkedController } from '../core/deadline.js';
import type { FailureCounts, WorkloadRecorder, WorkloadReport, WorkloadState } from './types.js';

/**
 * Body of a workload. Must return once `signal` is aborted.
 */
export type WorkloadRunner = (signal: AbortSignal, recorder: WorkloadRecorder) => Promise<void>;

export class WorkloadHandle {
  private currentState: WorkloadState = 'created';
  private controller: AbortController | null = null;
  private dispose: () => void = () => undefined;
  private done: Promise<void> | null = null;
  private startedAt = 0;
  private finishedAt: number | null = null;
  private attempted = 0;
  private succeeded = 0;
  private failed = 0;
  private readonly failures: Record<keyof FailureCounts, number> = {
    transient: 0,
    deadline: 0,
    configuration: 0,
    assertion: 0,
    unclassified: 0,
  };

  constructor(private readonly runner: WorkloadRunner) {}

  get state(): WorkloadState {
    return this.currentState;
  }

  /**
   * Starts the workload. Aborting `parent` cancels it.
   *
   * @throws {WorkloadHandleReusedError} If the handle was already started
   */
  start(parent?: AbortSignal): this {
    if (this.currentState !== 'created') {
      throw new WorkloadHandleReusedError(this.currentState);
    }

    const { controller, dispose } = linkedController(parent);
    this.controller = controller;
    this.dispose = dispose;
    this.currentState = 'running';
    this.startedAt = Date.now();

    const recorder: WorkloadRecorder = {
      attempt: () => {
        this.attempted++;
      },
      success: () => {
        this.succeeded++;
      },
      failure: (error) => this.recordFailure(error),
    };

    this.done = this.runner(controller.signal, recorder).then(
      () => this.finish(),
      (error: unknown) => {
        this.finish();
        if (isAbortError(error, controller.signal)) {
          return;
        }
        if (controller.signal.aborted || isTransientError(error)) {
          this.recordFailure(error);
          return;
        }
        throw error;
      },
    );

    return this;
  }

  /**
   * Requests cancellation. Idempotent; has no effect once finished.
   */
  cancel(): void {
    if (this.currentState === 'running' && this.controller) {
      this.controller.abort();
    }
  }

  /**
   * Waits for the workload to finish and returns its report.
   * Rejects only if the runner failed for a reason other than cancellation.
   */
  async join(): Promise<WorkloadReport> {
    if (this.done) {
      await this.done;
    }
    return this.report();
  }

  report(): WorkloadReport {
    const end = this.finishedAt ?? Date.now();
    return {
      attempted: this.attempted,
      succeeded: this.succeeded,
      failed: this.failed,
      failuresByKind: { ...this.failures },
      cancelled: this.currentState === 'cancelled',
      durationMs: this.currentState === 'created' ? 0 : end - this.startedAt,
    };
  }

  private recordFailure(error: unknown): void {
    this.failed++;
    this.failures[classifyError(error) ?? 'unclassified']++;
  }

  private finish(): void {
    this.finishedAt = Date.now();
    this.currentState = this.controller?.signal.aborted ? 'cancelled' : 'completed';
    this.dispose();
  }
}
