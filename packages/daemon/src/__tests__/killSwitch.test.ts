import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { KillSwitch } from '../killSwitch';
import { makeTempDir, removeDir } from './helpers';

describe('KillSwitch', () => {
  let dir: string;
  let killSwitch: KillSwitch;

  beforeEach(() => {
    dir = makeTempDir();
    killSwitch = new KillSwitch(join(dir, 'state', 'EMERGENCY_STOP'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('is released when no marker exists', () => {
    expect(killSwitch.isEngaged()).toBe(false);
  });

  it('engage writes the reason into the marker', async () => {
    await killSwitch.engage('bad batch of notes');
    expect(killSwitch.isEngaged()).toBe(true);
    expect(readFileSync(killSwitch.markerPath, 'utf-8')).toMatch(/^\d{4}-\d{2}-\d{2}T.*Z bad batch of notes\n$/);
  });

  it('release removes the marker and tolerates a missing one', async () => {
    await killSwitch.engage('x');
    await killSwitch.release();
    await killSwitch.release();
    expect(existsSync(killSwitch.markerPath)).toBe(false);
    expect(killSwitch.isEngaged()).toBe(false);
  });

  it('logs only on transitions', async () => {
    await killSwitch.engage('x');
    killSwitch.isEngaged();
    killSwitch.isEngaged();
    expect(console.warn).toHaveBeenCalledTimes(1);

    await killSwitch.release();
    killSwitch.isEngaged();
    expect(console.log).toHaveBeenCalledWith('[killswitch] Emergency marker removed; processing resumed');
  });
});
