import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DaemonError } from '../errors';
import { deepMerge, loadConfig, parseConfig, validateConfig } from '../config';
import { makeTempDir, removeDir } from './helpers';

describe('parseConfig', () => {
  it('applies defaults and resolves paths', () => {
    const config = parseConfig({ vaultPath: 'vault' }, '/home/user');

    expect(config.vaultPath).toBe('/home/user/vault');
    expect(config.stateDir).toBe('/home/user/vault/.automation');
    expect(config.pidFile).toBe('/home/user/vault/.automation/daemon.pid');
    expect(config.emergencyMarker).toBe('/home/user/vault/.automation/EMERGENCY_DISABLED');
    expect(config.monitoring).toEqual({ enabled: true, host: '127.0.0.1', port: 8765 });
    expect(config.watcher.debounceMs).toBe(5000);
    expect(config.transcript).toMatchObject({ cooldownSeconds: 300, maxQuotes: 7, minQuality: 0.7 });
    expect(config.organizer.dryRun).toBe(true);
  });

  it('keeps absolute state paths and honours a disabled pid file', () => {
    const config = parseConfig({ vaultPath: '/vault', stateDir: '/var/lib/vaultwatch', pidFile: null });
    expect(config.stateDir).toBe('/var/lib/vaultwatch');
    expect(config.pidFile).toBeNull();
  });

  it('lists every problem in one DaemonError', () => {
    let caught: unknown;
    try {
      parseConfig({ monitoring: { port: 70000 }, transcript: { minQuality: 2 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DaemonError);
    expect(caught).toMatchObject({
      message: expect.stringContaining('vaultPath: vaultPath is required'),
    });
    expect(caught).toMatchObject({
      message: expect.stringContaining('monitoring.port: Number must be less than or equal to 65535'),
    });
    expect(caught).toMatchObject({ message: expect.stringContaining('transcript.minQuality:') });
  });

  it('rejects intervals and timeouts that overflow a timer', () => {
    expect(() => parseConfig({ vaultPath: '/v', organizer: { intervalMinutes: 40000 } })).toThrow(
      'organizer.intervalMinutes: must fit in a timer (at most 2147483647ms)'
    );
    expect(() => parseConfig({ vaultPath: '/v', transcript: { timeoutSeconds: 3_000_000 } })).toThrow(
      'transcript.timeoutSeconds: must fit in a timer'
    );
    expect(() => parseConfig({ vaultPath: '/v', watcher: { debounceMs: 2 ** 31 } })).toThrow(
      'watcher.debounceMs: must fit in a timer'
    );
    expect(parseConfig({ vaultPath: '/v', organizer: { intervalMinutes: 35791 } }).organizer.intervalMinutes).toBe(35791);
  });

  it('rejects an invalid metrics prefix', () => {
    expect(() => parseConfig({ vaultPath: '/v', metrics: { prefix: '9bad-name' } })).toThrow(
      'metrics.prefix: prefix must be a valid Prometheus name'
    );
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(
      deepMerge({ a: { b: 1, c: 2 }, list: [1, 2] }, { a: { c: 3 }, list: [9] })
    ).toEqual({ a: { b: 1, c: 3 }, list: [9] });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('layers the YAML file, the environment and overrides', async () => {
    writeFileSync(join(dir, 'custom.yaml'), 'vaultPath: vault\nmonitoring:\n  port: 9000\ntranscript:\n  maxQuotes: 3\n');

    const config = await loadConfig({
      configPath: 'custom.yaml',
      cwd: dir,
      env: { PORT: '9999', AUTH_TOKEN: 'test-secret' },
      overrides: { monitoring: { host: '0.0.0.0' } },
    });

    expect(config.vaultPath).toBe(join(dir, 'vault'));
    expect(config.transcript.maxQuotes).toBe(3);
    expect(config.monitoring).toEqual({ enabled: true, host: '0.0.0.0', port: 9999, authToken: 'test-secret' });
  });

  it('reads the default file from the working directory', async () => {
    writeFileSync(join(dir, 'vaultwatch.config.yaml'), 'vaultPath: /notes\n');
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config.vaultPath).toBe('/notes');
  });

  it('uses VAULTWATCH_CONFIG when no path is given', async () => {
    writeFileSync(join(dir, 'other.yaml'), 'vaultPath: /other\n');
    const config = await loadConfig({ cwd: dir, env: { VAULTWATCH_CONFIG: 'other.yaml' } });
    expect(config.vaultPath).toBe('/other');
  });

  it('works without any file when the environment names the vault', async () => {
    const config = await loadConfig({ cwd: dir, env: { VAULT_PATH: '/from-env' } });
    expect(config.vaultPath).toBe('/from-env');
  });

  it('fails when an explicit file is missing', async () => {
    await expect(loadConfig({ configPath: 'missing.yaml', cwd: dir, env: {} })).rejects.toThrow(
      `Cannot read config ${join(dir, 'missing.yaml')}`
    );
  });

  it('fails when the file is not a mapping', async () => {
    writeFileSync(join(dir, 'list.yaml'), '- a\n- b\n');
    await expect(loadConfig({ configPath: 'list.yaml', cwd: dir, env: {} })).rejects.toThrow(
      `Config ${join(dir, 'list.yaml')} must be a YAML mapping`
    );
  });

  it('reports an unparsable PORT through validation', async () => {
    await expect(loadConfig({ cwd: dir, env: { VAULT_PATH: '/v', PORT: 'http' } })).rejects.toThrow(
      'monitoring.port: Expected number, received string'
    );
  });
});

describe('validateConfig', () => {
  let vault: string;

  beforeEach(() => {
    vault = makeTempDir();
  });

  afterEach(() => {
    removeDir(vault);
  });

  it('accepts the defaults for an existing vault', () => {
    expect(validateConfig(parseConfig({ vaultPath: vault }))).toEqual([]);
  });

  it('reports a missing vault and a vault that is a file', () => {
    const missing = join(vault, 'nope');
    expect(validateConfig(parseConfig({ vaultPath: missing }))).toEqual([`vaultPath does not exist: ${missing}`]);

    const file = join(vault, 'file.md');
    writeFileSync(file, '');
    expect(validateConfig(parseConfig({ vaultPath: file }))).toEqual([`vaultPath is not a directory: ${file}`]);
  });

  it('reports inconsistent health thresholds', () => {
    const config = parseConfig({
      vaultPath: vault,
      health: { failureRateThreshold: 0.3, degradedRateThreshold: 0.4, windowSize: 4, minSamples: 5 },
    });
    expect(validateConfig(config)).toEqual([
      'health.degradedRateThreshold must not exceed health.failureRateThreshold',
      'health.minSamples must not exceed health.windowSize',
    ]);
  });

  it('keeps every handler directory inside the vault', () => {
    mkdirSync(join(vault, 'Inbox'));
    const config = parseConfig({
      vaultPath: vault,
      screenshot: { capturesDir: '../outside' },
      organizer: { targets: { permanent: '/abs/Permanent' }, statuses: ['promoted', 'processing'] },
    });
    expect(validateConfig(config)).toEqual([
      'screenshot.capturesDir must be a path inside the vault: ../outside',
      'organizer.targets.permanent must be a path inside the vault: /abs/Permanent',
      'organizer.statuses must not include processing',
    ]);
  });
});
