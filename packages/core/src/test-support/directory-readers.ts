import * as path from 'path';
import type { DirectoryEntries, DirectoryReader } from '../indexer/directory-reader';

/**
 * Directory reader over a list of relative file paths and (optionally empty) folder paths.
 * Folder paths end with "/". Paths are resolved against rootPath.
 */
export class MemoryDirectoryReader implements DirectoryReader {
  private entries = new Map<string, DirectoryEntries>();

  constructor(rootPath: string, relativePaths: string[]) {
    this.ensureDir(path.resolve(rootPath));
    for (const relative of relativePaths) {
      const isDir = relative.endsWith('/');
      const parts = relative.split('/').filter(Boolean);
      let current = path.resolve(rootPath);
      parts.forEach((part, index) => {
        const last = index === parts.length - 1;
        const bucket = this.ensureDir(current);
        if (last && !isDir) {
          if (!bucket.files.includes(part)) bucket.files.push(part);
          return;
        }
        if (!bucket.directories.includes(part)) bucket.directories.push(part);
        current = path.join(current, part);
        this.ensureDir(current);
      });
    }
  }

  async listEntries(dirPath: string): Promise<DirectoryEntries> {
    const key = path.resolve(dirPath);
    const entries = this.entries.get(key);
    if (!entries) {
      throw new Error(`ENOENT: no such file or directory, scandir '${key}'`);
    }
    return { files: [...entries.files], directories: [...entries.directories] };
  }

  private ensureDir(dirPath: string): DirectoryEntries {
    let bucket = this.entries.get(dirPath);
    if (!bucket) {
      bucket = { files: [], directories: [] };
      this.entries.set(dirPath, bucket);
    }
    return bucket;
  }
}

/**
 * Wraps another reader and fails reads of the given directories (relative to rootPath).
 */
export class UnreadableDirectoryReader implements DirectoryReader {
  private locked: Set<string>;

  constructor(private inner: DirectoryReader, rootPath: string, relativeDirs: string[]) {
    this.locked = new Set(relativeDirs.map((dir) => path.resolve(rootPath, dir)));
  }

  async listEntries(dirPath: string): Promise<DirectoryEntries> {
    const key = path.resolve(dirPath);
    if (this.locked.has(key)) {
      throw new Error(`EACCES: permission denied, scandir '${key}'`);
    }
    return this.inner.listEntries(dirPath);
  }
}
