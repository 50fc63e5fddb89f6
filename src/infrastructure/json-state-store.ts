import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import type { FileSystemPort } from '../application/ports/file-system.port';
import type { StateLock, StateStorePort } from '../application/ports/state-store.port';
import { StateLockedError, StateStoreCorruptError, errorMessage } from '../domain/errors';
import { STATE_FILE_VERSION, emptyHistory, stateFileSchema } from '../domain/history';
import type { History, StateFile } from '../domain/history';
import type { RunSnapshot } from '../domain/run-snapshot';
import { getLogger } from '../utils/get-logger';

const lockInfoSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

type LockInfo = z.infer<typeof lockInfoSchema>;

const defaultIsProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means it exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
};

export type JsonStateStoreOptions = {
  stateFile: string;
  lockFile: string;
  now?: () => Date;
  isProcessAlive?: (pid: number) => boolean;
};

export class JsonStateStore implements StateStorePort {
  private readonly logger = getLogger();
  private readonly now: () => Date;
  private readonly isProcessAlive: (pid: number) => boolean;

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly options: JsonStateStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.isProcessAlive = options.isProcessAlive ?? defaultIsProcessAlive;
  }

  public async acquireLock(): Promise<StateLock> {
    const { lockFile } = this.options;
    await this.fileSystem.ensureDirectory(path.dirname(lockFile));

    const info: LockInfo = {
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: this.now().toISOString(),
    };
    const contents = `${JSON.stringify(info)}\n`;

    if (!(await this.fileSystem.createExclusive(lockFile, contents))) {
      const holder = await this.readLockInfo();
      if (!holder || !this.isStale(holder)) {
        const heldBy = holder
          ? `pid ${holder.pid} on ${holder.hostname} since ${holder.acquiredAt}`
          : 'an unknown process';
        throw new StateLockedError(
          `State lock '${lockFile}' is held by ${heldBy}; another run appears to be in progress`,
        );
      }

      this.logger.warn(
        { lockFile, pid: holder.pid, acquiredAt: holder.acquiredAt },
        'Taking over stale state lock left by a process that no longer exists',
      );
      await this.fileSystem.remove(lockFile);
      if (!(await this.fileSystem.createExclusive(lockFile, contents))) {
        throw new StateLockedError(`State lock '${lockFile}' was taken by another run`);
      }
    }

    this.logger.debug(`State lock acquired: path=${lockFile}`);
    let released = false;
    return {
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        await this.fileSystem.remove(lockFile);
        this.logger.debug(`State lock released: path=${lockFile}`);
      },
    };
  }

  public async load(): Promise<History> {
    const { stateFile } = this.options;
    let content: string | null;
    try {
      content = await this.fileSystem.readFile(stateFile);
    } catch (error) {
      throw new StateStoreCorruptError(`Cannot read state file '${stateFile}': ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (content === null) {
      this.logger.info({ stateFile }, 'No state file yet; starting with empty history');
      return emptyHistory();
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new StateStoreCorruptError(
        `State file '${stateFile}' is not valid JSON: ${errorMessage(error)}. ` +
          'Restore it from a backup or run "periodic-audit reset-state".',
        { cause: error },
      );
    }

    const parsed = stateFileSchema.safeParse(document);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown layout';
      throw new StateStoreCorruptError(
        `State file '${stateFile}' has an unexpected layout (${where}). ` +
          'Restore it from a backup or run "periodic-audit reset-state".',
      );
    }

    return new Map(Object.entries(parsed.data.targets));
  }

  public async commit(snapshot: RunSnapshot): Promise<void> {
    const { stateFile } = this.options;
    const history = await this.load();

    for (const result of snapshot.results) {
      // A failed audit says nothing about what is present
      if (result.status !== 'ok') {
        continue;
      }
      history.set(result.target.path, {
        advisories: [...new Set(result.findings.map((finding) => finding.advisoryId))].sort(),
        scannedAt: snapshot.generatedAt,
      });
    }

    const state: StateFile = {
      version: STATE_FILE_VERSION,
      updatedAt: this.now().toISOString(),
      targets: Object.fromEntries([...history.entries()].sort(([left], [right]) => left.localeCompare(right))),
    };

    await this.fileSystem.ensureDirectory(path.dirname(stateFile));
    await this.fileSystem.writeFileAtomic(stateFile, `${JSON.stringify(state, null, 2)}\n`);
    this.logger.info({ stateFile, targets: history.size }, 'State committed');
  }

  public async reset(): Promise<string | null> {
    const { stateFile } = this.options;
    if (!(await this.fileSystem.exists(stateFile))) {
      return null;
    }
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const backupPath = `${stateFile}.reset-${stamp}`;
    await this.fileSystem.rename(stateFile, backupPath);
    this.logger.warn({ stateFile, backupPath }, 'State file moved aside; next run starts with empty history');
    return backupPath;
  }

  private async readLockInfo(): Promise<LockInfo | null> {
    const content = await this.fileSystem.readFile(this.options.lockFile);
    if (content === null) {
      return null;
    }
    try {
      const parsed = lockInfoSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger.debug(`Unreadable lock file: path=${this.options.lockFile}, error=${errorMessage(error)}`);
      return null;
    }
  }

  private isStale(holder: LockInfo): boolean {
    return holder.hostname === os.hostname() && !this.isProcessAlive(holder.pid);
  }
}
