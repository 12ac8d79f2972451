/**
 * Harness settings.
 *
 * All timings are tunable test parameters, not protocol guarantees. Values
 * come from `DEFAULTS`, optionally overridden by code or by `BFT_CHAOS_*`
 * environment variables.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULTS } from './types.js';

const positiveInt = z.number().int().positive();

const settingsSchema = z.object({
  statusPollIntervalMs: positiveInt,
  perPollTimeoutMs: positiveInt,
  viewWaitDeadlineMs: positiveInt,
  workloadWindowMs: positiveInt,
  readYourWritesDeadlineMs: positiveInt,
  readYourWritesAttemptTimeoutMs: positiveInt,
  settleAfterViewChangeMs: z.number().int().nonnegative(),
  settleAfterRestartMs: z.number().int().nonnegative(),
  concurrentOps: positiveInt,
  warmupOps: positiveInt,
  workloadIntensity: positiveInt,
  stopTimeoutMs: positiveInt,
  statusTimerMs: positiveInt,
  viewChangeTimeoutMs: positiveInt,
  seed: z.number().int().optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']),
});

/**
 * Fully resolved harness settings.
 */
export type HarnessSettings = Readonly<z.infer<typeof settingsSchema>>;

const DEFAULT_SETTINGS: HarnessSettings = {
  statusPollIntervalMs: DEFAULTS.STATUS_POLL_INTERVAL_MS,
  perPollTimeoutMs: DEFAULTS.PER_POLL_TIMEOUT_MS,
  viewWaitDeadlineMs: DEFAULTS.VIEW_WAIT_DEADLINE_MS,
  workloadWindowMs: DEFAULTS.WORKLOAD_WINDOW_MS,
  readYourWritesDeadlineMs: DEFAULTS.READ_YOUR_WRITES_DEADLINE_MS,
  readYourWritesAttemptTimeoutMs: DEFAULTS.READ_YOUR_WRITES_ATTEMPT_TIMEOUT_MS,
  settleAfterViewChangeMs: DEFAULTS.SETTLE_AFTER_VIEW_CHANGE_MS,
  settleAfterRestartMs: DEFAULTS.SETTLE_AFTER_RESTART_MS,
  concurrentOps: DEFAULTS.CONCURRENT_OPS,
  warmupOps: DEFAULTS.WARMUP_OPS,
  workloadIntensity: DEFAULTS.WORKLOAD_INTENSITY,
  stopTimeoutMs: DEFAULTS.STOP_TIMEOUT_MS,
  statusTimerMs: DEFAULTS.STATUS_TIMER_MS,
  viewChangeTimeoutMs: DEFAULTS.VIEW_CHANGE_TIMEOUT_MS,
  logLevel: 'info',
};

/**
 * Environment variable suffix for every numeric setting.
 */
const ENV_KEYS = {
  statusPollIntervalMs: 'STATUS_POLL_INTERVAL_MS',
  perPollTimeoutMs: 'PER_POLL_TIMEOUT_MS',
  viewWaitDeadlineMs: 'VIEW_WAIT_DEADLINE_MS',
  workloadWindowMs: 'WORKLOAD_WINDOW_MS',
  readYourWritesDeadlineMs: 'READ_YOUR_WRITES_DEADLINE_MS',
  readYourWritesAttemptTimeoutMs: 'READ_YOUR_WRITES_ATTEMPT_TIMEOUT_MS',
  settleAfterViewChangeMs: 'SETTLE_AFTER_VIEW_CHANGE_MS',
  settleAfterRestartMs: 'SETTLE_AFTER_RESTART_MS',
  concurrentOps: 'CONCURRENT_OPS',
  warmupOps: 'WARMUP_OPS',
  workloadIntensity: 'WORKLOAD_INTENSITY',
  stopTimeoutMs: 'STOP_TIMEOUT_MS',
  statusTimerMs: 'STATUS_TIMER_MS',
  viewChangeTimeoutMs: 'VIEW_CHANGE_TIMEOUT_MS',
  seed: 'SEED',
} as const satisfies Partial<Record<keyof HarnessSettings, string>>;

export const ENV_PREFIX = 'BFT_CHAOS_';

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws {ConfigurationError} If any value is out of range
 */
export function resolveSettings(overrides: Partial<HarnessSettings> = {}): HarnessSettings {
  return validate({ ...DEFAULT_SETTINGS, ...overrides });
}

function validate(input: Readonly<Record<string, unknown>>): HarnessSettings {
  const parsed = settingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid harness settings: ${issues}`);
  }
  return parsed.data;
}

/**
 * Reads overrides from `BFT_CHAOS_*` environment variables, e.g.
 * `BFT_CHAOS_VIEW_WAIT_DEADLINE_MS=60000` or `BFT_CHAOS_LOG_LEVEL=debug`.
 *
 * @throws {ConfigurationError} If a variable is not a valid integer or level
 */
export function settingsFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: Partial<HarnessSettings> = {},
): HarnessSettings {
  const fromEnv: Record<string, unknown> = {};

  for (const [key, suffix] of Object.entries(ENV_KEYS)) {
    const raw = env[`${ENV_PREFIX}${suffix}`];
    if (raw === undefined || raw.trim() === '') continue;

    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new ConfigurationError(`${ENV_PREFIX}${suffix} must be an integer, got '${raw}'`);
    }
    fromEnv[key] = value;
  }

  const level = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (level !== undefined && level.trim() !== '') {
    fromEnv['logLevel'] = level.trim();
  }

  return validate({ ...DEFAULT_SETTINGS, ...fromEnv, ...overrides });
}
