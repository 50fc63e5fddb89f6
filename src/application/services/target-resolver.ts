import path from 'node:path';

import { errorMessage } from '../../domain/errors';
import type { Target } from '../../domain/target';
import { getLogger } from '../../utils/get-logger';
import type { FileSystemPort } from '../ports/file-system.port';

/**
 * Turns configured targets into the list audited this run: directories
 * expand to the files they contain, duplicate paths collapse to the first.
 * Every configured target yields at least one entry.
 */
export class TargetResolver {
  private readonly logger = getLogger();

  public constructor(private readonly fileSystem: FileSystemPort) {}

  public async resolve(configured: readonly Target[]): Promise<Target[]> {
    const resolved: Target[] = [];
    const seen = new Set<string>();

    const add = (target: Target) => {
      if (seen.has(target.path)) {
        this.logger.warn({ target: target.path }, 'Target listed more than once; auditing it once');
        return;
      }
      seen.add(target.path);
      resolved.push(target);
    };

    for (const target of configured) {
      for (const expanded of await this.expand(target)) {
        add(expanded);
      }
    }

    return resolved;
  }

  private async expand(target: Target): Promise<Target[]> {
    let isDirectory = false;
    try {
      isDirectory = (await this.fileSystem.stat(target.path)).isDirectory;
    } catch (error) {
      // Missing targets stay in the list so the report accounts for them
      this.logger.debug(`Cannot stat target: path=${target.path}, error=${errorMessage(error)}`);
      return [target];
    }
    if (!isDirectory) {
      return [target];
    }

    try {
      const entries = await this.fileSystem.listEntries(target.path);
      const prefix = target.name ?? path.basename(target.path);
      const files = entries
        .filter((entry) => entry.type !== 'directory')
        .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0))
        .map((entry) => ({ path: entry.path, name: `${prefix}/${entry.name}` }));

      // An empty directory still needs an outcome, so it is kept as the target itself
      if (files.length === 0) {
        this.logger.warn({ target: target.path }, 'Target directory contains no files to audit');
        return [target];
      }
      return files;
    } catch (error) {
      this.logger.warn({ target: target.path, error: errorMessage(error) }, 'Cannot list target directory');
      return [target];
    }
  }
}
