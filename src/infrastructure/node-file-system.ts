import { constants, promises as fs } from 'node:fs';
import type { Dirent } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';

import type { FileSystemEntry, FileSystemPort, FileStats } from '../application/ports/file-system.port';
import { getLogger } from '../utils/get-logger';

const mapEntryType = (entry: Dirent): FileSystemEntry['type'] => {
  if (entry.isFile()) {
    return 'file';
  }
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isSymbolicLink()) {
    return 'symlink';
  }
  return 'other';
};

const isErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

export class NodeFileSystem implements FileSystemPort {
  private readonly logger = getLogger();

  public async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  public async isExecutable(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath, constants.X_OK);
      const stats = await fs.stat(targetPath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  public async listEntries(targetPath: string): Promise<FileSystemEntry[]> {
    const entries = await fs.readdir(targetPath, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      path: path.join(targetPath, entry.name),
      type: mapEntryType(entry),
    }));
  }

  public async stat(targetPath: string): Promise<FileStats> {
    const stats = await fs.stat(targetPath);
    return { isDirectory: stats.isDirectory() };
  }

  public async ensureDirectory(targetPath: string): Promise<void> {
    await fs.mkdir(targetPath, { recursive: true });
  }

  public async readFile(targetPath: string): Promise<string | null> {
    try {
      return await fs.readFile(targetPath, 'utf8');
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  public async appendFile(targetPath: string, contents: string): Promise<void> {
    await fs.appendFile(targetPath, contents, 'utf8');
  }

  public async writeFileAtomic(targetPath: string, contents: string): Promise<void> {
    const directory = path.dirname(targetPath);
    const tempPath = path.join(directory, `.${path.basename(targetPath)}.tmp-${process.pid}`);

    const handle = await fs.open(tempPath, 'w', 0o600);
    try {
      await handle.writeFile(contents, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    try {
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    await this.syncDirectory(directory);
  }

  public async createExclusive(targetPath: string, contents: string): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(targetPath, 'wx', 0o600);
    } catch (error) {
      if (isErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }

    try {
      await handle.writeFile(contents, 'utf8');
    } finally {
      await handle.close();
    }
    return true;
  }

  public async rename(fromPath: string, toPath: string): Promise<void> {
    await fs.rename(fromPath, toPath);
  }

  public async remove(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { force: true });
  }

  // Makes the rename itself durable. Not every platform can open directories.
  private async syncDirectory(directory: string): Promise<void> {
    let handle: FileHandle | null = null;
    try {
      handle = await fs.open(directory, 'r');
      await handle.sync();
    } catch (error) {
      this.logger.debug(`Directory fsync skipped: path=${directory}, error=${String(error)}`);
    } finally {
      await handle?.close();
    }
  }
}
