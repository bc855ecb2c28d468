import { mkdir, open, readFile, rm } from 'fs/promises';
import { dirname } from 'path';
import { DaemonError, isNodeError } from './errors';

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isNodeError(err) && err.code === 'EPERM';
  }
}

/**
 * Single-instance guard. The PID file is created exclusively; a file left
 * behind by a process that is no longer alive is replaced.
 */
export class PidLock {
  private held = false;

  constructor(
    readonly filePath: string,
    private pid: number = process.pid,
    private isAlive: (pid: number) => boolean = isProcessAlive
  ) {}

  isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held) return;
    await mkdir(dirname(this.filePath), { recursive: true });

    if (await this.tryCreate()) return;

    const owner = await this.readOwner();
    if (owner !== null && owner !== this.pid && this.isAlive(owner)) {
      throw new DaemonError(`Another daemon is running (pid ${owner}, lock ${this.filePath})`);
    }

    console.warn(`[pid] Replacing stale lock ${this.filePath} (pid ${owner ?? 'unreadable'})`);
    await rm(this.filePath, { force: true });
    if (!(await this.tryCreate())) {
      throw new DaemonError(`Could not acquire lock ${this.filePath}`);
    }
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;
    const owner = await this.readOwner();
    if (owner === this.pid) {
      await rm(this.filePath, { force: true });
    }
  }

  private async tryCreate(): Promise<boolean> {
    try {
      const handle = await open(this.filePath, 'wx');
      try {
        await handle.writeFile(`${this.pid}\n`, 'utf-8');
      } finally {
        await handle.close();
      }
      this.held = true;
      return true;
    } catch (err) {
      if (isNodeError(err) && err.code === 'EEXIST') return false;
      throw err;
    }
  }

  private async readOwner(): Promise<number | null> {
    try {
      const pid = parseInt((await readFile(this.filePath, 'utf-8')).trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }
}
