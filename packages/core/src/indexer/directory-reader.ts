import * as fs from 'fs';

/**
 * Read-only access to the directory tree.
 */

export type DirectoryEntries = {
  files: string[];
  directories: string[];
};

export interface DirectoryReader {
  /**
   * List the direct children of an absolute directory path.
   * Rejects when the directory cannot be read; callers decide how to degrade.
   */
  listEntries(dirPath: string): Promise<DirectoryEntries>;
}

// Folders never offered as taxonomy or crawled
const EXCLUDED_FOLDERS = new Set([
  'node_modules',
  '.git',
  '.svn',
  '.hg',
  '__pycache__',
  '.cache',
  '.npm',
  '.yarn',
  'venv',
  '.venv',
]);

/**
 * Checks if a file or folder should be left out of scans and taxonomy.
 */
export function shouldExclude(name: string): boolean {
  // Hidden entries, including macOS "._" resource forks and .DS_Store
  if (name.startsWith('.')) {
    return true;
  }
  return EXCLUDED_FOLDERS.has(name);
}

export class FsDirectoryReader implements DirectoryReader {
  async listEntries(dirPath: string): Promise<DirectoryEntries> {
    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    const files: string[] = [];
    const directories: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory()) {
        directories.push(entry.name);
      } else if (entry.isFile()) {
        files.push(entry.name);
      }
    }
    return { files, directories };
  }
}
