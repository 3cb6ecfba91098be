/**
 * Prompt context for one file: everything the oracle sees besides the instructions.
 * Every part is bounded so prompts stay small on very large trees.
 */
import * as path from 'path';
import {
  FILE_HINT_MAX_ANCESTORS,
  NEIGHBOR_PROMPT_MAX_SIBLINGS,
  TAXONOMY_PROMPT_MAX_CHILDREN,
  TAXONOMY_PROMPT_MAX_PARENTS,
} from '../constants';
import type { FileEntry } from '../contracts';
import type { DirectoryReader } from '../indexer/directory-reader';
import { shouldExclude } from '../indexer/directory-reader';
import type { ProjectType } from '../indexer/project-detector';
import { categorizeFile } from '../indexer/project-detector';
import type { TaxonomySnapshot } from '../indexer/taxonomy-snapshot';
import type { NamingConvention } from './naming-convention';

export type PromptContext = {
  rootName: string;
  fileName: string;
  relativePath: string;
  hint: string;
  /** Sample of the existing top-level taxonomy. */
  taxonomy: string;
  neighbors: string;
  projectType: ProjectType;
  namingConvention: NamingConvention;
};

export type PromptEnvironment = {
  rootName: string;
  snapshot: TaxonomySnapshot;
  reader: DirectoryReader;
  projectType: ProjectType;
  namingConvention: NamingConvention;
};

/**
 * Directory names from the scan root down to the file's parent.
 */
function ancestorNames(file: FileEntry, rootName: string): string[] {
  const dirs = file.relative_path.split('/').filter(Boolean).slice(0, -1);
  return [rootName, ...dirs];
}

export function buildFileHint(file: FileEntry, rootName: string): string {
  const ancestors = ancestorNames(file, rootName);
  const parent = ancestors[ancestors.length - 1];
  const lineage = `Parent=${parent}; Ancestors=${ancestors.slice(-FILE_HINT_MAX_ANCESTORS).join('/')}`;
  const trail = `Name=${file.name}; ${lineage}`;

  switch (categorizeFile(file.name)) {
    case 'image':
      return `Type=Image; SizeBytes=${file.size}; ${trail}`;
    case 'audio':
      return `Type=Audio; SizeBytes=${file.size}; ${trail}`;
    case 'video':
      return `Type=Video; SizeBytes=${file.size}; ${trail}`;
    case 'doc':
      return `Type=Doc; ${trail}`;
    case 'terraform':
      return `Type=Terraform; ${trail}`;
    default:
      return `Filename=${file.name}; ${lineage}; Ext=${file.extension || '(none)'}`;
  }
}

/**
 * Sibling folders and files of the file's parent directory. Unreadable parents give empty lists.
 */
export async function buildNeighborContext(
  file: FileEntry,
  rootName: string,
  reader: DirectoryReader,
  maxSiblings: number = NEIGHBOR_PROMPT_MAX_SIBLINGS
): Promise<string> {
  const ancestors = ancestorNames(file, rootName);
  const parentName = ancestors[ancestors.length - 1];
  let dirs: string[] = [];
  let siblings: string[] = [];
  try {
    const entries = await reader.listEntries(path.dirname(file.path));
    dirs = entries.directories.filter((name) => !shouldExclude(name)).slice(0, maxSiblings);
    siblings = entries.files
      .filter((name) => name !== file.name && !shouldExclude(name))
      .slice(0, maxSiblings);
  } catch (error) {
    console.warn(`[PromptContext] Could not list neighbors of ${file.path}:`, error);
  }
  return `ParentDir=${parentName}; SiblingDirs=${dirs.join(', ')}; SiblingFiles=${siblings.join(', ')}`;
}

export async function buildPromptContext(file: FileEntry, env: PromptEnvironment): Promise<PromptContext> {
  return {
    rootName: env.rootName,
    fileName: file.name,
    relativePath: file.relative_path,
    hint: buildFileHint(file, env.rootName),
    taxonomy: env.snapshot.describeTopLevel(TAXONOMY_PROMPT_MAX_PARENTS, TAXONOMY_PROMPT_MAX_CHILDREN),
    neighbors: await buildNeighborContext(file, env.rootName, env.reader),
    projectType: env.projectType,
    namingConvention: env.namingConvention,
  };
}
