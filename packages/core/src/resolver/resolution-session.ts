import * as path from 'path';
import { SuggestionCache } from '../cache/suggestion-cache';
import { createSuggestionStore } from '../cache/suggestion-store';
import type { ResolverConfig } from '../config/resolver-config';
import { parseResolverConfig, resolveCacheLocation, resolveJournalLocation } from '../config/resolver-config';
import type { DirectoryReader } from '../indexer/directory-reader';
import { FsDirectoryReader } from '../indexer/directory-reader';
import type { ProjectProfile } from '../indexer/project-detector';
import { detectProject } from '../indexer/project-detector';
import { TaxonomySnapshot } from '../indexer/taxonomy-snapshot';
import { ScanJournal } from '../journal/scan-journal';
import type { GuardrailContext } from './guardrail-policy';
import { detectNamingConvention } from './naming-convention';

/**
 * Everything one scan shares between workers: the cache handle, the taxonomy snapshot and the
 * guardrail context. Built once per scan and passed explicitly; nothing here is global.
 */
export type ResolutionSession = Readonly<{
  rootPath: string;
  rootName: string;
  config: ResolverConfig;
  cache: SuggestionCache;
  snapshot: TaxonomySnapshot;
  reader: DirectoryReader;
  project: ProjectProfile;
  guardrails: GuardrailContext;
  journal: ScanJournal | null;
}>;

export type ResolutionSessionOptions = {
  rootPath: string;
  config?: ResolverConfig;
  /** Defaults to a cache over the store named by config.cache. */
  cache?: SuggestionCache;
  /** Defaults to the filesystem. */
  reader?: DirectoryReader;
  /** Defaults to a journal at config.journal.location when config.journal.enabled. */
  journal?: ScanJournal | null;
};

export async function createResolutionSession(options: ResolutionSessionOptions): Promise<ResolutionSession> {
  const rootPath = path.resolve(options.rootPath);
  const config = options.config ?? parseResolverConfig({});
  const reader = options.reader ?? new FsDirectoryReader();
  const rootName = config.rootName ?? path.basename(rootPath);

  const snapshot = await TaxonomySnapshot.build(rootPath, reader);
  const project = await detectProject(rootPath, reader);
  const namingConvention = config.namingConvention ?? detectNamingConvention(snapshot.allDirectoryNames());

  const cache =
    options.cache ??
    (await SuggestionCache.open(createSuggestionStore(config.cache.backend, resolveCacheLocation(config, rootPath))));

  let journal: ScanJournal | null = null;
  if (options.journal !== undefined) {
    journal = options.journal;
  } else if (config.journal.enabled) {
    journal = new ScanJournal(resolveJournalLocation(config, rootPath));
  }

  const guardrails: GuardrailContext = {
    rootName,
    pinnedRules: config.pinnedRules,
    stayUnderRoot: config.stayUnderRoot,
    preferFolderMove: config.preferFolderMove,
    namingConvention,
    aliases: config.aliasGroups,
    existingTopLevel: [...snapshot.knownChildren('')],
    sentinel: config.sentinel,
  };

  console.log(
    `[ResolutionSession] Root "${rootName}" (${project.projectType}), naming ${namingConvention}, ` +
      `${guardrails.existingTopLevel.length} top-level folders, cache ${cache.location}`
  );

  return { rootPath, rootName, config, cache, snapshot, reader, project, guardrails, journal };
}
