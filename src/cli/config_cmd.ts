import { DEFAULT_SETTINGS, SETTING_KEYS, isSettingKey } from '../core/settings.js';
import { deleteConfig, getConfigAll, setConfig } from '../db/config.js';
import type { DB } from '../db/db.js';

/** Every tunable with its effective value and where it came from. */
export function getConfigView(db: DB): Record<string, { value: number; source: 'config' | 'default' }> {
  const stored = getConfigAll(db);
  const res: Record<string, { value: number; source: 'config' | 'default' }> = {};
  for (const [key, name] of Object.entries(SETTING_KEYS)) {
    const fallback = Number(DEFAULT_SETTINGS[name]);
    const n = key in stored ? Number(stored[key]) : NaN;
    res[key] = Number.isFinite(n) && n >= 0 ? { value: n, source: 'config' } : { value: fallback, source: 'default' };
  }
  return res;
}

export function setConfigKV(db: DB, key: string, value: string): void {
  if (!isSettingKey(key)) {
    throw new Error(`Unknown config key '${key}'. Known keys: ${Object.keys(SETTING_KEYS).join(', ')}`);
  }
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new Error(`Config value for '${key}' must be a non-negative number`);
  }
  setConfig(db, key, String(n));
}

/** Drops an override so the default applies again. */
export function unsetConfigKey(db: DB, key: string): boolean {
  return deleteConfig(db, key);
}
