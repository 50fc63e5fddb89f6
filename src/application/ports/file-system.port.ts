export type FileSystemEntry = {
  name: string;
  path: string;
  type: 'file' | 'directory' | 'symlink' | 'other';
};

export type FileStats = {
  isDirectory: boolean;
};

export interface FileSystemPort {
  exists(path: string): Promise<boolean>;
  isExecutable(path: string): Promise<boolean>;
  listEntries(path: string): Promise<FileSystemEntry[]>;
  stat(path: string): Promise<FileStats>;
  ensureDirectory(path: string): Promise<void>;
  /** Resolves to null when the file does not exist. */
  readFile(path: string): Promise<string | null>;
  appendFile(path: string, contents: string): Promise<void>;
  /**
   * Replace `path` so that readers observe either the previous or the new
   * contents, never a partial write.
   */
  writeFileAtomic(path: string, contents: string): Promise<void>;
  /** Create `path` only if it does not exist yet. Resolves to false if it does. */
  createExclusive(path: string, contents: string): Promise<boolean>;
  rename(fromPath: string, toPath: string): Promise<void>;
  remove(path: string): Promise<void>;
}
