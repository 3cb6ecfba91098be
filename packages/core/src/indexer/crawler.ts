import * as fs from 'fs';
import * as path from 'path';
import type { FileEntry } from '../contracts';
import { shouldExclude } from './directory-reader';

// Maximum depth to keep pathological trees bounded (the walk itself is iterative)
const MAX_DEPTH = 100;

export interface CrawlOptions {
  /** Stops the walk early; files found so far are returned. */
  signal?: AbortSignal;
  onError?: (error: string) => void;
}

/**
 * Stat a file and describe it relative to the scan root.
 */
export async function describeFile(filePath: string, rootPath: string): Promise<FileEntry> {
  const stats = await fs.promises.stat(filePath);
  const name = path.basename(filePath);
  return {
    path: filePath,
    name,
    extension: path.extname(name).toLowerCase(),
    size: stats.size,
    mtimeMs: stats.mtimeMs,
    relative_path: path.relative(rootPath, filePath).split(path.sep).join('/'),
  };
}

/**
 * Crawls a directory using an iterative stack-based walk and returns every regular file.
 * Hidden entries and tool folders (node_modules, .git, ...) are skipped.
 */
export async function crawlFiles(rootPath: string, options: CrawlOptions = {}): Promise<FileEntry[]> {
  const files: FileEntry[] = [];
  const stack: Array<{ dir: string; depth: number }> = [{ dir: rootPath, depth: 0 }];

  while (stack.length > 0) {
    if (options.signal?.aborted) {
      console.log(`[Crawler] Walk cancelled after ${files.length} files`);
      break;
    }
    const current = stack.pop();
    if (!current) break;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(current.dir, { withFileTypes: true });
    } catch (error) {
      const message = `Cannot read directory ${current.dir}: ${String(error)}`;
      console.warn(`[Crawler] ${message}`);
      options.onError?.(message);
      continue;
    }

    for (const entry of entries) {
      if (shouldExclude(entry.name)) continue;
      const fullPath = path.join(current.dir, entry.name);

      if (entry.isDirectory()) {
        if (current.depth < MAX_DEPTH) {
          stack.push({ dir: fullPath, depth: current.depth + 1 });
        }
      } else if (entry.isFile()) {
        try {
          files.push(await describeFile(fullPath, rootPath));
        } catch (error) {
          const message = `Cannot stat ${fullPath}: ${String(error)}`;
          console.warn(`[Crawler] ${message}`);
          options.onError?.(message);
        }
      }
    }
  }

  return files;
}
