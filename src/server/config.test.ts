import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigError, loadRuntimeEnv, readServerConfig } from './config';

describe('readServerConfig', () => {
  it('falls back to defaults', () => {
    const config = readServerConfig({});
    expect(config.host).toBe('127.0.0.1');
    expect(config.port).toBe(8080);
    expect(config.busyTimeoutMs).toBe(2000);
    expect(config.lockRetries).toBe(3);
    expect(config.lockBackoffMs).toBe(100);
    expect(config.maxBodyBytes).toBe(2097152);
    expect(config.dbPath).toBe(path.resolve('./data-local', 'pos-sync.sqlite3'));
  });

  it('coerces numeric variables and treats blanks as unset', () => {
    const config = readServerConfig({ POS_SYNC_PORT: '9090', POS_SYNC_LOCK_RETRIES: ' ' });
    expect(config.port).toBe(9090);
    expect(config.lockRetries).toBe(3);
  });

  it('rejects out-of-range values', () => {
    expect(() => readServerConfig({ POS_SYNC_PORT: '70000' })).toThrow(ConfigError);
    expect(() => readServerConfig({ POS_SYNC_LOCK_RETRIES: 'two' })).toThrow(/POS_SYNC_LOCK_RETRIES/);
  });
});

describe('loadRuntimeEnv', () => {
  const dirs: string[] = [];

  afterEach(() => {
    dirs.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  });

  it('reads config.env from the data directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pos-sync-config-'));
    dirs.push(dir);
    fs.writeFileSync(path.join(dir, 'config.env'), 'POS_SYNC_PORT=9191\n');

    const env: NodeJS.ProcessEnv = { POS_SYNC_DATA_DIR: dir };
    loadRuntimeEnv(env);

    expect(env.POS_SYNC_PORT).toBe('9191');
    expect(readServerConfig(env).port).toBe(9191);
  });
});
