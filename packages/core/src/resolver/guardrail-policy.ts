/**
 * GuardrailPolicy
 *
 * Enforces organization-wide invariants on a sanitized path, whatever the oracle said.
 * Rules run in a fixed priority:
 *
 * 1. Pin            - recognized file classes go to a fixed subpath under the root; nothing else runs
 * 2. Root           - the first segment must be the root name (when stayUnderRoot is on)
 * 3. Naming         - generated segments follow the tree's kebab-case / snake_case style
 * 4. Alias          - a missing conventional folder (src, docs, ...) becomes its existing synonym
 *
 * Workflow Context:
 * - Called by: ResolutionOrchestrator after sanitizePath(), before snapToTaxonomy()
 * - Pure and synchronous; the context is built once per run by createResolutionSession()
 */
import { DEFAULT_SENTINEL_PATH, MAX_PATH_SEGMENTS } from '../constants';
import type { NamingConvention } from './naming-convention';
import { applyNamingConvention } from './naming-convention';
import { splitSegments } from './path-sanitizer';

export type PinnedRule = {
  id: string;
  /** Lowercase name endings, e.g. ".tf" or ".lock.hcl". */
  suffixes?: string[];
  /** Exact file names (case-insensitive), e.g. "Dockerfile". */
  fileNames?: string[];
  /** Destination under the root, e.g. "infrastructure/terraform". */
  subpath: string;
};

/** Interchangeable names for one conventional folder role. */
export type AliasGroup = readonly string[];

export type GuardrailContext = Readonly<{
  rootName: string;
  pinnedRules: readonly PinnedRule[];
  stayUnderRoot: boolean;
  preferFolderMove: boolean;
  namingConvention: NamingConvention;
  aliases: readonly AliasGroup[];
  /** Folder names that already exist directly under the root. */
  existingTopLevel: readonly string[];
  sentinel: string;
}>;

export type GuardrailResult = {
  path: string;
  pinned: boolean;
};

export const DEFAULT_PINNED_RULES: PinnedRule[] = [
  {
    id: 'terraform',
    suffixes: ['.tf', '.tfvars', '.tfstate', '.lock.hcl'],
    subpath: 'infrastructure/terraform',
  },
];

export const DEFAULT_ALIAS_GROUPS: AliasGroup[] = [
  ['src', 'source', 'app', 'lib'],
  ['docs', 'doc', 'documentation'],
  ['tests', 'test', 'spec', '__tests__'],
  ['config', 'conf', 'settings', 'cfg'],
  ['assets', 'static', 'public', 'media'],
];

export function findPinnedRule(fileName: string, rules: readonly PinnedRule[]): PinnedRule | undefined {
  const lower = fileName.toLowerCase();
  return rules.find(
    (rule) =>
      (rule.suffixes ?? []).some((suffix) => lower.endsWith(suffix.toLowerCase())) ||
      (rule.fileNames ?? []).some((name) => name.toLowerCase() === lower)
  );
}

export function pinnedPath(rule: PinnedRule, rootName: string): string {
  return [rootName, ...splitSegments(rule.subpath)].slice(0, MAX_PATH_SEGMENTS).join('/');
}

export function startsWithRoot(path: string, rootName: string): boolean {
  const [first] = splitSegments(path);
  return first !== undefined && first.toLowerCase() === rootName.toLowerCase();
}

function substituteAlias(segment: string, context: GuardrailContext): string {
  const lower = segment.toLowerCase();
  const existing = context.existingTopLevel;
  if (existing.some((name) => name.toLowerCase() === lower)) {
    return segment;
  }

  const group = context.aliases.find((aliases) => aliases.some((alias) => alias.toLowerCase() === lower));
  if (!group) {
    return segment;
  }

  const synonym = existing.find((name) => group.some((alias) => alias.toLowerCase() === name.toLowerCase()));
  if (synonym) {
    console.log(`[GuardrailPolicy] Substituted alias "${segment}" -> existing "${synonym}"`);
    return synonym;
  }
  return segment;
}

/**
 * Apply the guardrails to an already-sanitized path for the given file.
 */
export function applyGuardrails(
  path: string,
  file: { name: string },
  context: GuardrailContext
): GuardrailResult {
  const sentinel = context.sentinel || DEFAULT_SENTINEL_PATH;

  const rule = findPinnedRule(file.name, context.pinnedRules);
  if (rule) {
    return { path: pinnedPath(rule, context.rootName), pinned: true };
  }

  let segments = splitSegments(path);
  if (segments.length === 0) {
    segments = [sentinel];
  }

  if (context.stayUnderRoot && !startsWithRoot(segments.join('/'), context.rootName)) {
    segments = [context.rootName, ...segments].slice(0, MAX_PATH_SEGMENTS);
  }

  const firstGenerated = startsWithRoot(segments.join('/'), context.rootName) ? 1 : 0;

  segments = segments.map((segment, index) => {
    if (index < firstGenerated || segment.toLowerCase() === sentinel.toLowerCase()) {
      return segment;
    }
    return applyNamingConvention(segment, context.namingConvention);
  });

  if (segments.length > firstGenerated) {
    segments[firstGenerated] = substituteAlias(segments[firstGenerated], context);
  }

  return { path: segments.join('/'), pinned: false };
}
