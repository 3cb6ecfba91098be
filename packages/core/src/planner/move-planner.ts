import {
  MOVE_PLAN_AGREEMENT_RATIO,
  MOVE_PLAN_MIN_GROUP_SIZE,
  MOVE_PLAN_PREFIX_DEPTH,
} from '../constants';
import type { FileEntry } from '../contracts';
import { splitSegments } from '../resolver/path-sanitizer';
import type { ResolutionSession } from '../resolver/resolution-session';

/**
 * Move planning: turn resolved destinations into folder moves and file moves.
 * Nothing here touches the disk; every path is relative to the scan root.
 *
 * Files are grouped by their top-level `.app` bundle, otherwise by their parent directory.
 * A whole group moves as one folder when:
 * - it is an `.app` bundle,
 * - folder moves are preferred and the root is a project,
 * - or more than 4 files agree (>= 60%) on the first two destination segments.
 * The folder lands under the majority prefix; everything else moves file by file.
 */

export type PlannedFile = {
  file: Pick<FileEntry, 'path' | 'relative_path'>;
  /** Resolved destination folder. */
  path: string;
};

export type FolderMoveReason = 'app-bundle' | 'project' | 'agreement';

export type FolderMove = {
  kind: 'folder';
  /** Directory being moved, relative to the root. */
  source: string;
  /** New location of that directory, including its own name. */
  destination: string;
  reason: FolderMoveReason;
  files: string[];
};

export type FileMove = {
  kind: 'file';
  source: string;
  /** Destination folder; the file keeps its name. */
  destination: string;
};

export type MovePlan = {
  folderMoves: FolderMove[];
  fileMoves: FileMove[];
};

export type MovePlanOptions = {
  rootName: string;
  stayUnderRoot: boolean;
  preferFolderMove: boolean;
  isProject: boolean;
};

export function movePlanOptionsFromSession(session: ResolutionSession): MovePlanOptions {
  return {
    rootName: session.rootName,
    stayUnderRoot: session.guardrails.stayUnderRoot,
    preferFolderMove: session.guardrails.preferFolderMove,
    isProject: session.project.isProject,
  };
}

/**
 * Directory a file moves with: its outermost `.app` ancestor, else its parent ("" for the root).
 */
export function groupDirectory(relativePath: string): string {
  const segments = relativePath.split('/').filter(Boolean);
  const bundle = segments.slice(0, -1).findIndex((segment) => segment.toLowerCase().endsWith('.app'));
  if (bundle >= 0) {
    return segments.slice(0, bundle + 1).join('/');
  }
  return segments.slice(0, -1).join('/');
}

function prefixKey(path: string): string {
  return splitSegments(path).slice(0, MOVE_PLAN_PREFIX_DEPTH).join('/');
}

/**
 * Most common destination prefix and its count. Ties keep the prefix seen first.
 */
export function majorityPrefix(paths: readonly string[]): { prefix: string; count: number } {
  const counts = new Map<string, number>();
  let prefix = '';
  let best = 0;
  for (const path of paths) {
    const key = prefixKey(path);
    const count = (counts.get(key) ?? 0) + 1;
    counts.set(key, count);
    if (count > best) {
      best = count;
      prefix = key;
    }
  }
  return { prefix, count: best };
}

function withinRoot(path: string, options: MovePlanOptions): string {
  if (!options.stayUnderRoot) return path;
  const [first] = splitSegments(path);
  if (first !== undefined && first.toLowerCase() === options.rootName.toLowerCase()) {
    return path;
  }
  return path ? `${options.rootName}/${path}` : options.rootName;
}

function folderMoveReason(dir: string, size: number, agreement: number, options: MovePlanOptions): FolderMoveReason | null {
  if (dir.toLowerCase().endsWith('.app')) return 'app-bundle';
  if (options.preferFolderMove && options.isProject) return 'project';
  if (size > MOVE_PLAN_MIN_GROUP_SIZE && agreement >= MOVE_PLAN_AGREEMENT_RATIO) return 'agreement';
  return null;
}

function insideMovedDir(dir: string, movedDirs: ReadonlySet<string>): boolean {
  for (const moved of movedDirs) {
    if (dir === moved || dir.startsWith(`${moved}/`)) return true;
  }
  return false;
}

function depth(dir: string): number {
  return dir ? dir.split('/').length : 0;
}

export function planMoves(items: readonly PlannedFile[], options: MovePlanOptions): MovePlan {
  const groups = new Map<string, PlannedFile[]>();
  for (const item of items) {
    const dir = groupDirectory(item.file.relative_path);
    const group = groups.get(dir);
    if (group) {
      group.push(item);
    } else {
      groups.set(dir, [item]);
    }
  }

  const folderMoves: FolderMove[] = [];
  const movedDirs = new Set<string>();

  // Shallow groups first: a moved folder carries its subfolders with it
  const ordered = [...groups.entries()].sort(([a], [b]) => depth(a) - depth(b));

  for (const [dir, group] of ordered) {
    // The scan root itself can only be reorganized file by file
    if (dir === '' || insideMovedDir(dir, movedDirs)) continue;

    const { prefix, count } = majorityPrefix(group.map((item) => item.path));
    const reason = folderMoveReason(dir, group.length, count / group.length, options);
    if (!reason) continue;

    const dirName = dir.split('/').pop() ?? dir;
    const base = withinRoot(prefix, options);
    folderMoves.push({
      kind: 'folder',
      source: dir,
      destination: base ? `${base}/${dirName}` : dirName,
      reason,
      files: group.map((item) => item.file.relative_path),
    });
    movedDirs.add(dir);
  }

  const fileMoves: FileMove[] = [];
  for (const [dir, group] of groups) {
    if (insideMovedDir(dir, movedDirs)) continue;
    for (const item of group) {
      fileMoves.push({
        kind: 'file',
        source: item.file.relative_path,
        destination: withinRoot(item.path, options),
      });
    }
  }

  console.log(`[MovePlanner] Planned ${folderMoves.length} folder moves and ${fileMoves.length} file moves`);
  return { folderMoves, fileMoves };
}
