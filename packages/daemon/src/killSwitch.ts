import { existsSync } from 'fs';
import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Operator circuit breaker: while the marker file exists, no file event
 * or scheduled run is processed. Checked before every unit of work.
 */
export class KillSwitch {
  private lastSeen = false;

  constructor(readonly markerPath: string) {}

  isEngaged(): boolean {
    const engaged = existsSync(this.markerPath);
    if (engaged !== this.lastSeen) {
      this.lastSeen = engaged;
      if (engaged) console.warn(`[killswitch] Emergency marker present at ${this.markerPath}; processing disabled`);
      else console.log('[killswitch] Emergency marker removed; processing resumed');
    }
    return engaged;
  }

  /** Create the marker. The reason is written into it for the operator. */
  async engage(reason: string) {
    await mkdir(dirname(this.markerPath), { recursive: true });
    await writeFile(this.markerPath, `${new Date().toISOString()} ${reason}\n`, 'utf-8');
  }

  async release() {
    await rm(this.markerPath, { force: true });
  }
}
