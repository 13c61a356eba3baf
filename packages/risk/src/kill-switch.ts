import { existsSync, rmSync, writeFileSync } from 'fs';

/** File-flag kill switch: while the file exists the engine refuses to quote. */
export class KillSwitch {
  constructor(readonly path: string) {}

  isEngaged(): boolean {
    return existsSync(this.path);
  }

  engage(now: Date = new Date()): void {
    writeFileSync(this.path, `${now.toISOString()}\n`);
  }

  /** Returns false when there was no flag to clear. */
  clear(): boolean {
    if (!this.isEngaged()) {
      return false;
    }
    rmSync(this.path);
    return true;
  }
}
