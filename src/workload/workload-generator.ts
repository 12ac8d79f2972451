/**
 * WorkloadGenerator - client traffic against the cluster under test.
 *
 * Individual operation failures are expected while replicas are down: retryable
 * ones are counted and classified in the workload report, while anything else
 * ends the window and propagates to the caller. Whether the cluster made progress is decided by the caller, through the
 * tracker or a read-your-writes check.
 *
 * @module workload/workload-generator
 */

import { AssertionViolationError, isTransientError, toError } from '../core/errors.js';
import { delay, linkedController, moveOnAfter } from '../core/deadline.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { defaultRandom, type RandomSource } from '../core/random.js';
import { DEFAULTS } from '../core/types.js';
import { ConvergencePoller } from '../poller/convergence-poller.js';
import { WorkloadHandle } from './workload-handle.js';
import type {
  KeyValue,
  KvClient,
  LinearizabilityTracker,
  WorkloadRecorder,
  WorkloadReport,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface WorkloadGeneratorOptions {
  readonly client: KvClient;
  /** When present, indefinite workloads and batches are tracked operations. */
  readonly tracker?: LinearizabilityTracker;
  readonly random?: RandomSource;
  readonly logger?: Logger;
  /** Prefix of generated keys. Default: 'key'. */
  readonly keyPrefix?: string;
  /** Pause after a failed operation before the worker retries. Default: 10. */
  readonly failurePauseMs?: number;
  /**
   * Which operation failures are retried, both by workload workers and by
   * read-your-writes attempts. Default: transient errors.
   */
  readonly isRetryable?: (error: unknown) => boolean;
}

export interface ReadYourWritesOptions {
  /** Overall deadline. Default: 60000. */
  readonly deadlineMs?: number;
  /** Timeout of one attempt. Default: 5000. */
  readonly attemptTimeoutMs?: number;
  /** Pause between attempts. Default: 100. */
  readonly intervalMs?: number;
  readonly signal?: AbortSignal;
}

// =============================================================================
// WorkloadGenerator
// =============================================================================

/**
 * Issues writes and tracked operations against the cluster.
 *
 * @example
 * ```typescript
 * const workload = new WorkloadGenerator({ client, tracker });
 *
 * const baseline = await workload.issueOne();
 * await workload.assertWriteExecuted(baseline);
 *
 * await cluster.stop(0);
 * const report = await workload.runBounded(1000);
 * ```
 */
export class WorkloadGenerator {
  private readonly client: KvClient;
  private readonly tracker: LinearizabilityTracker | undefined;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly keyPrefix: string;
  private readonly failurePauseMs: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly active: Set<WorkloadHandle> = new Set();
  private keyCounter = 0;

  constructor(options: WorkloadGeneratorOptions) {
    this.client = options.client;
    this.tracker = options.tracker;
    this.random = options.random ?? defaultRandom;
    this.logger = options.logger ?? silentLogger();
    this.keyPrefix = options.keyPrefix ?? 'key';
    this.failurePauseMs = options.failurePauseMs ?? 10;
    this.isRetryable = options.isRetryable ?? isTransientError;
  }

  /**
   * Writes a fresh random key/value pair.
   *
   * @returns The pair that was written
   */
  async issueOne(signal?: AbortSignal): Promise<KeyValue> {
    const kv = this.nextKeyValue();
    await this.client.write(kv.key, kv.value, signal);
    return kv;
  }

  /**
   * Reads `key` back and checks it holds `value`.
   *
   * @throws {AssertionViolationError} If a different value is read
   */
  async assertWriteExecuted(kv: KeyValue, signal?: AbortSignal): Promise<void> {
    const observed = await this.client.read(kv.key, signal);
    if (observed !== kv.value) {
      throw new AssertionViolationError(`Write of '${kv.key}' was not executed`, kv.value, observed);
    }
  }

  /**
   * Reads the last committed block marker.
   */
  readLastCommitted(signal?: AbortSignal): Promise<number> {
    return this.client.lastCommitted(signal);
  }

  /**
   * Starts an unbounded stream of writes with `intensity` concurrent workers.
   * With a tracker, the stream consists of tracked operations instead.
   *
   * The returned handle is running; cancel and join it, or abort `signal`.
   */
  injectIndefinitely(
    intensity: number = DEFAULTS.WORKLOAD_INTENSITY,
    signal?: AbortSignal,
  ): WorkloadHandle {
    const handle = this.createHandle(intensity).start(signal);
    this.active.add(handle);
    // A handle that failed stays tracked so that `drain()` reports its error.
    void handle.join().then(
      () => this.active.delete(handle),
      () => undefined,
    );
    return handle;
  }

  /**
   * Number of handles started by `injectIndefinitely` that have not settled,
   * or that failed and were not drained yet.
   */
  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Cancels every handle started by `injectIndefinitely` and still tracked,
   * and waits until all of them have settled.
   *
   * @returns Reports of the drained handles
   */
  async drain(): Promise<WorkloadReport[]> {
    const handles = Array.from(this.active);
    this.active.clear();
    for (const handle of handles) {
      handle.cancel();
    }
    return Promise.all(handles.map((handle) => handle.join()));
  }

  /**
   * Injects writes for `durationMs`, then cancels them and waits for every
   * in-flight operation to settle. Expiry of the window is the expected
   * outcome, not an error.
   */
  async runBounded(
    durationMs: number,
    intensity: number = DEFAULTS.WORKLOAD_INTENSITY,
    signal?: AbortSignal,
  ): Promise<WorkloadReport> {
    const handle = this.createHandle(intensity);

    await moveOnAfter(
      durationMs,
      async (windowSignal) => {
        await handle.start(windowSignal).join();
      },
      signal,
    );

    const report = handle.report();
    this.logger.debug(
      `Workload window closed: ${report.succeeded}/${report.attempted} operations succeeded`,
      { ...report },
    );
    return report;
  }

  /**
   * Runs a batch of `count` operations that must all succeed.
   * With a tracker the batch is tracked; otherwise it is `count` writes with
   * at most `concurrency` in flight.
   */
  async runConcurrentOps(
    count: number,
    concurrency: number = 10,
    signal?: AbortSignal,
  ): Promise<void> {
    if (this.tracker) {
      await this.tracker.runConcurrentOps(count, signal);
      return;
    }

    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < count) {
        next++;
        const kv = await this.issueOne(signal);
        await this.assertWriteExecuted(kv, signal);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, count) }, () => worker()));
  }

  /**
   * Retries a read-your-writes check until it succeeds once.
   * Each attempt runs under its own timeout; only transient failures are
   * retried.
   *
   * @throws {ConvergenceTimeoutError} If no attempt succeeds before the deadline
   */
  async confirmReadYourWrites(options: ReadYourWritesOptions = {}): Promise<void> {
    const {
      deadlineMs = DEFAULTS.READ_YOUR_WRITES_DEADLINE_MS,
      attemptTimeoutMs = DEFAULTS.READ_YOUR_WRITES_ATTEMPT_TIMEOUT_MS,
      intervalMs = DEFAULTS.STATUS_POLL_INTERVAL_MS,
      signal,
    } = options;

    await ConvergencePoller.retryUntil((attemptSignal) => this.readYourWritesOnce(attemptSignal), {
      deadlineMs,
      perPollTimeoutMs: attemptTimeoutMs,
      intervalMs,
      message: 'Read-your-writes did not succeed',
      isRetryable: this.isRetryable,
      logger: this.logger,
      ...(signal !== undefined ? { signal } : {}),
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async readYourWritesOnce(signal: AbortSignal): Promise<void> {
    if (this.tracker) {
      await this.tracker.trackedReadYourWrites(signal);
      return;
    }
    const kv = await this.issueOne(signal);
    await this.assertWriteExecuted(kv, signal);
  }

  private createHandle(intensity: number): WorkloadHandle {
    if (!Number.isInteger(intensity) || intensity < 1) {
      throw new RangeError(`intensity must be a positive integer, got ${intensity}`);
    }

    const tracker = this.tracker;
    if (tracker) {
      return new WorkloadHandle((signal, recorder) =>
        tracker.sendIndefiniteTrackedOps(intensity, signal, recorder),
      );
    }

    return new WorkloadHandle(async (signal, recorder) => {
      // The first worker that fails for good stops the others.
      const { controller, dispose } = linkedController(signal);
      try {
        const results = await Promise.allSettled(
          Array.from({ length: intensity }, async () => {
            try {
              await this.writeUntilAborted(controller.signal, recorder);
            } catch (error) {
              controller.abort(error);
              throw error;
            }
          }),
        );
        for (const result of results) {
          if (result.status === 'rejected') {
            throw result.reason;
          }
        }
      } finally {
        dispose();
      }
    });
  }

  /**
   * Writes until `signal` is aborted. Retryable failures are counted and
   * retried after a pause; any other failure ends the loop with that error.
   */
  private async writeUntilAborted(signal: AbortSignal, recorder: WorkloadRecorder): Promise<void> {
    while (!signal.aborted) {
      recorder.attempt();
      try {
        await this.issueOne(signal);
        recorder.success();
        // Yield to the timer queue so an always-ready client cannot starve
        // the window deadline.
        await delay(0, signal);
      } catch (error) {
        recorder.failure(error);
        if (signal.aborted) {
          return;
        }
        if (!this.isRetryable(error)) {
          throw error;
        }
        this.logger.debug(`Write failed: ${toError(error).message}`);
        await delay(this.failurePauseMs, signal);
      }
    }
  }

  private nextKeyValue(): KeyValue {
    const id = this.keyCounter++;
    return {
      key: `${this.keyPrefix}-${id}-${this.randomToken()}`,
      value: this.randomToken(),
    };
  }

  private randomToken(): string {
    return Math.floor(this.random.next() * 0x100000000).toString(16).padStart(8, '0');
  }
}
