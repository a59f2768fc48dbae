import * as assert from 'assert';
import { getConfigView, setConfigKV, unsetConfigKey } from '../../../cli/config_cmd.js';
import { settingsFromConfig } from '../../../core/settings.js';
import { getConfigAll } from '../../../db/config.js';
import { openDB, type DB } from '../../../db/db.js';

suite('config command', () => {
  let db: DB;

  setup(() => {
    db = openDB(':memory:');
  });

  teardown(() => {
    db.close();
  });

  test('shows defaults until a key is set', () => {
    const view = getConfigView(db);
    assert.deepStrictEqual(view.grace_ms, { value: 2000, source: 'default' });
    assert.deepStrictEqual(view.retry_timeouts, { value: 0, source: 'default' });
    assert.strictEqual(Object.keys(view).length, 13);
  });

  test('set stores a normalised number that the engine settings pick up', () => {
    setConfigKV(db, 'grace_ms', '2500.0');
    setConfigKV(db, 'retry_timeouts', '1');

    assert.deepStrictEqual(getConfigAll(db), { grace_ms: '2500', retry_timeouts: '1' });
    assert.deepStrictEqual(getConfigView(db).grace_ms, { value: 2500, source: 'config' });

    const settings = settingsFromConfig(getConfigAll(db));
    assert.strictEqual(settings.graceMs, 2500);
    assert.strictEqual(settings.retryTimeouts, true);
  });

  test('set overwrites an existing value', () => {
    setConfigKV(db, 'poll_interval_ms', '100');
    setConfigKV(db, 'poll_interval_ms', '200');
    assert.deepStrictEqual(getConfigAll(db), { poll_interval_ms: '200' });
  });

  test('rejects unknown keys', () => {
    assert.throws(() => setConfigKV(db, 'max_retries', '3'), /^Error: Unknown config key 'max_retries'\. Known keys: grace_ms, /);
    assert.deepStrictEqual(getConfigAll(db), {});
  });

  test('rejects values that are not non-negative numbers', () => {
    for (const bad of ['', '  ', 'abc', '-1', 'Infinity']) {
      assert.throws(() => setConfigKV(db, 'grace_ms', bad), {
        message: "Config value for 'grace_ms' must be a non-negative number",
      });
    }
    assert.deepStrictEqual(getConfigAll(db), {});
  });

  test('unset restores the default', () => {
    setConfigKV(db, 'grace_ms', '10');
    assert.strictEqual(unsetConfigKey(db, 'grace_ms'), true);
    assert.strictEqual(unsetConfigKey(db, 'grace_ms'), false);
    assert.deepStrictEqual(getConfigView(db).grace_ms, { value: 2000, source: 'default' });
  });

  test('a bad stored value shows as the default', () => {
    db.prepare('INSERT INTO config(key, value) VALUES (?, ?)').run('grace_ms', 'soon');
    assert.deepStrictEqual(getConfigView(db).grace_ms, { value: 2000, source: 'default' });
  });
});
