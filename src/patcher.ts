/**
 * Source Patcher
 *
 * Swaps a candidate into the single target file of the external source tree and
 * puts the original back. The backup lives next to the target so a crashed run
 * can be recovered by the next one.
 *
 * A lock file beside the target is held for the whole patched window. Only the
 * patcher that wrote the backup may restore it; another process finding the
 * lock held by a live pid leaves the target alone.
 *
 * Contents are written into the existing target rather than renamed over it,
 * so a target that is a symlink or has other hard links stays one.
 */

import { promises as fs, readFileSync, rmSync, writeFileSync } from 'fs';
import { PatchFailure, RestoreFailure, errorMessage } from './errors.js';
import { pathExists, writeFileAtomic } from './fs-utils.js';
import { LockFile } from './lock.js';
import { Logger, silentLogger } from './logger.js';

export const BACKUP_SUFFIX = '.evolve.bak';
export const LOCK_SUFFIX = '.evolve.lock';

export class SourcePatcher {
  readonly targetPath: string;
  readonly backupPath: string;
  readonly lockPath: string;
  private lock: LockFile;
  private logger: Logger;
  private ownsBackup = false;

  constructor(targetPath: string, options: { logger?: Logger } = {}) {
    this.targetPath = targetPath;
    this.backupPath = targetPath + BACKUP_SUFFIX;
    this.lockPath = targetPath + LOCK_SUFFIX;
    this.logger = options.logger ?? silentLogger;
    this.lock = new LockFile(this.lockPath, { description: 'patch lock', logger: this.logger });
  }

  /**
   * Back up the target and write `source` in its place
   */
  async patch(source: string): Promise<void> {
    if (this.ownsBackup) {
      throw new PatchFailure(`${this.targetPath} is already patched; restore before patching`);
    }
    if (!(await this.lock.tryAcquire())) {
      throw new PatchFailure(`${this.targetPath} is being patched by another evaluation (${this.lockPath})`);
    }

    try {
      await this.backUp();
    } catch (error) {
      await this.lock.release();
      throw error;
    }
    this.ownsBackup = true;

    try {
      await fs.writeFile(this.targetPath, source);
    } catch (error) {
      // Whether or not the write landed, the backup holds the original bytes.
      await this.restore();
      throw new PatchFailure(`Cannot write ${this.targetPath}: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug('Patched target', { target: this.targetPath, bytes: source.length });
  }

  /**
   * Put the backed-up contents back. Returns false when this patcher holds no backup.
   */
  async restore(): Promise<boolean> {
    if (!this.ownsBackup) {
      return false;
    }
    try {
      await fs.writeFile(this.targetPath, await fs.readFile(this.backupPath));
      await fs.rm(this.backupPath);
    } catch (error) {
      throw new RestoreFailure(this.targetPath, { cause: error });
    }
    this.ownsBackup = false;
    await this.lock.release();
    this.logger.debug('Restored target', { target: this.targetPath });
    return true;
  }

  /**
   * Synchronous restore for signal handlers, where awaiting is not an option.
   */
  restoreSync(): boolean {
    if (!this.ownsBackup) {
      return false;
    }
    try {
      writeFileSync(this.targetPath, readFileSync(this.backupPath));
      rmSync(this.backupPath);
    } catch (error) {
      throw new RestoreFailure(this.targetPath, { cause: error });
    }
    this.ownsBackup = false;
    this.lock.releaseSync();
    return true;
  }

  /**
   * Restore a backup left behind by a previous process that died mid-iteration.
   * A backup whose lock is held by a live process belongs to that process.
   */
  async recoverStale(): Promise<boolean> {
    if (this.ownsBackup) {
      return false;
    }
    if (await this.lock.isHeld()) {
      this.logger.warn('Target is patched by a live evaluation; leaving it alone', {
        target: this.targetPath,
        lock: this.lockPath,
      });
      return false;
    }
    if (!(await pathExists(this.backupPath))) {
      await this.lock.release();
      return false;
    }
    try {
      await fs.writeFile(this.targetPath, await fs.readFile(this.backupPath));
      await fs.rm(this.backupPath);
    } catch (error) {
      throw new RestoreFailure(this.targetPath, { cause: error });
    }
    await this.lock.release();
    this.logger.warn('Recovered stale backup from an interrupted run', { target: this.targetPath });
    return true;
  }

  isPatched(): boolean {
    return this.ownsBackup;
  }

  private async backUp(): Promise<void> {
    if (await pathExists(this.backupPath)) {
      throw new PatchFailure(`Backup already present at ${this.backupPath}; restore before patching`);
    }

    let original: Buffer;
    let mode: number;
    try {
      original = await fs.readFile(this.targetPath);
      mode = (await fs.stat(this.targetPath)).mode;
    } catch (error) {
      throw new PatchFailure(`Cannot read ${this.targetPath}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      await fs.access(this.targetPath, fs.constants.W_OK);
      await writeFileAtomic(this.backupPath, original);
      await fs.chmod(this.backupPath, mode);
    } catch (error) {
      await fs.rm(this.backupPath, { force: true });
      throw new PatchFailure(`Cannot back up ${this.targetPath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
