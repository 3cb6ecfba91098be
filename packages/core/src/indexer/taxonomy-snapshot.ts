/**
 * TaxonomySnapshot
 *
 * Point-in-time map from a directory (relative to the scan root, "" for the root itself) to the
 * names of its child directories. Seeded by a bounded breadth-first walk when a scan starts and
 * extended lazily, per ancestor, when the snapper asks about a deeper directory.
 *
 * Never refreshed mid-scan: folders created while the scan runs are not visible.
 *
 * Workflow Context:
 * - build(): Called once per scan by createResolutionSession()
 * - childDirectories(): Used by snapToTaxonomy() for every post-root segment
 * - describeTopLevel(): Taxonomy sample rendered into oracle prompts
 * - allDirectoryNames(): Input to naming-convention detection
 */
import * as path from 'path';
import { TAXONOMY_SNAPSHOT_MAX_DEPTH } from '../constants';
import type { DirectoryReader } from './directory-reader';
import { shouldExclude } from './directory-reader';

export class TaxonomySnapshot {
  private children = new Map<string, string[]>();
  private pending = new Map<string, Promise<string[]>>();

  private constructor(
    readonly rootPath: string,
    private reader: DirectoryReader
  ) {}

  static async build(
    rootPath: string,
    reader: DirectoryReader,
    maxDepth: number = TAXONOMY_SNAPSHOT_MAX_DEPTH
  ): Promise<TaxonomySnapshot> {
    const snapshot = new TaxonomySnapshot(rootPath, reader);
    let level = [''];
    for (let depth = 0; depth < maxDepth && level.length > 0; depth++) {
      const next: string[] = [];
      for (const relDir of level) {
        const names = await snapshot.childDirectories(relDir);
        next.push(...names.map((name) => joinRelative(relDir, name)));
      }
      level = next;
    }
    console.log(`[TaxonomySnapshot] Seeded ${snapshot.children.size} directories under ${rootPath}`);
    return snapshot;
  }

  /**
   * Child directory names of a relative directory. Unreadable or missing directories yield [].
   */
  async childDirectories(relDir: string): Promise<string[]> {
    const known = this.children.get(relDir);
    if (known) return known;

    let inFlight = this.pending.get(relDir);
    if (!inFlight) {
      inFlight = this.readChildren(relDir);
      this.pending.set(relDir, inFlight);
    }
    const names = await inFlight;
    this.children.set(relDir, names);
    this.pending.delete(relDir);
    return names;
  }

  /** Children already in the snapshot, without touching the disk. */
  knownChildren(relDir: string): readonly string[] {
    return this.children.get(relDir) ?? [];
  }

  allDirectoryNames(): string[] {
    return [...this.children.values()].flat();
  }

  /**
   * Render a capped sample of top-level folders (each with a capped list of children).
   */
  describeTopLevel(maxParents: number, maxChildren: number): string {
    const byName = (a: string, b: string) => a.toLowerCase().localeCompare(b.toLowerCase());
    const parents = [...this.knownChildren('')].sort(byName).slice(0, maxParents);
    if (parents.length === 0) {
      return '(no subfolders yet)';
    }
    return parents
      .map((parent) => {
        const kids = [...this.knownChildren(parent)].sort(byName).slice(0, maxChildren);
        return kids.length > 0 ? `- ${parent}/ -> ${kids.join(', ')}` : `- ${parent}/`;
      })
      .join('\n');
  }

  private async readChildren(relDir: string): Promise<string[]> {
    const absDir = relDir ? path.join(this.rootPath, ...relDir.split('/')) : this.rootPath;
    try {
      const { directories } = await this.reader.listEntries(absDir);
      return directories.filter((name) => !shouldExclude(name));
    } catch (error) {
      console.warn(`[TaxonomySnapshot] Could not read ${absDir}, treating it as empty:`, error);
      return [];
    }
  }
}

export function joinRelative(relDir: string, name: string): string {
  return relDir ? `${relDir}/${name}` : name;
}
