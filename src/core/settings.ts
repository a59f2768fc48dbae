import type { RetrySettings } from './retryPolicy.js';

export interface EngineSettings extends RetrySettings {
  /** Extra time granted to an executor after its deadline or cancellation. */
  graceMs: number;
  /** Idle wait of a worker blocked on an empty queue. */
  pollIntervalMs: number;
  cancelPollMs: number;
  heartbeatIntervalMs: number;
  /** A worker without a heartbeat for this long counts as unhealthy. */
  workerStaleMs: number;
  sweepIntervalMs: number;
  /** Running jobs without a heartbeat for this long are orphans; 0 disables. */
  orphanHeartbeatMs: number;
  shutdownTimeoutMs: number;
  errorBackoffMs: number;
  healthCheckIntervalMs: number;
}

export const DEFAULT_SETTINGS: EngineSettings = {
  graceMs: 2000,
  pollIntervalMs: 500,
  cancelPollMs: 250,
  heartbeatIntervalMs: 5000,
  workerStaleMs: 60_000,
  sweepIntervalMs: 30_000,
  orphanHeartbeatMs: 120_000,
  retryTimeouts: false,
  retryBackoffMs: 0,
  retryBackoffMaxMs: 600_000,
  shutdownTimeoutMs: 10_000,
  errorBackoffMs: 1000,
  healthCheckIntervalMs: 60_000,
};

/** Keys of the `config` table and the setting each one overrides. */
export const SETTING_KEYS: Record<string, keyof EngineSettings> = {
  grace_ms: 'graceMs',
  poll_interval_ms: 'pollIntervalMs',
  cancel_poll_ms: 'cancelPollMs',
  heartbeat_interval_ms: 'heartbeatIntervalMs',
  worker_stale_ms: 'workerStaleMs',
  sweep_interval_ms: 'sweepIntervalMs',
  orphan_heartbeat_ms: 'orphanHeartbeatMs',
  retry_timeouts: 'retryTimeouts',
  retry_backoff_ms: 'retryBackoffMs',
  retry_backoff_max_ms: 'retryBackoffMaxMs',
  shutdown_timeout_ms: 'shutdownTimeoutMs',
  error_backoff_ms: 'errorBackoffMs',
  health_check_interval_ms: 'healthCheckIntervalMs',
};

export function isSettingKey(key: string): boolean {
  return Object.prototype.hasOwnProperty.call(SETTING_KEYS, key);
}

/**
 * Builds settings from `config` table rows. Values that are not finite
 * non-negative numbers keep their default.
 */
export function settingsFromConfig(
  rows: Record<string, string>,
  overrides: Partial<EngineSettings> = {},
): EngineSettings {
  const settings: EngineSettings = { ...DEFAULT_SETTINGS };
  for (const [key, raw] of Object.entries(rows)) {
    const name = SETTING_KEYS[key];
    if (!name) continue;
    const n = Number(raw);
    if (!Number.isFinite(n) || n < 0) continue;
    if (name === 'retryTimeouts') settings.retryTimeouts = n !== 0;
    else settings[name] = n;
  }
  return { ...settings, ...overrides };
}
