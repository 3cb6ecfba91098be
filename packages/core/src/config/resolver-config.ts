import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  DEFAULT_CACHE_DB_FILE,
  DEFAULT_CACHE_FILE,
  DEFAULT_CONFIG_FILE,
  DEFAULT_JOURNAL_FILE,
  DEFAULT_SENTINEL_PATH,
  TAXONOMY_SNAP_CUTOFF,
} from '../constants';
import { DEFAULT_ALIAS_GROUPS, DEFAULT_PINNED_RULES } from '../resolver/guardrail-policy';

export class ResolverConfigError extends Error {
  constructor(
    message: string,
    readonly configPath: string
  ) {
    super(message);
    this.name = 'ResolverConfigError';
  }
}

// ============================================================================
// Schema
// ============================================================================

export const PinnedRuleSchema = z
  .object({
    id: z.string().min(1),
    suffixes: z.array(z.string().min(1)).optional(),
    fileNames: z.array(z.string().min(1)).optional(),
    subpath: z.string().min(1),
  })
  .refine((rule) => (rule.suffixes?.length ?? 0) + (rule.fileNames?.length ?? 0) > 0, {
    message: 'A pinned rule needs at least one suffix or file name',
  });

export const CacheConfigSchema = z.object({
  backend: z.enum(['json', 'sqlite']).default('json'),
  /** Relative paths resolve against the scan root. */
  location: z.string().min(1).optional(),
});

export const JournalConfigSchema = z.object({
  enabled: z.boolean().default(false),
  location: z.string().min(1).optional(),
});

export const ResolverConfigSchema = z.object({
  /** Defaults to the scan root's folder name. */
  rootName: z.string().min(1).optional(),
  stayUnderRoot: z.boolean().default(true),
  preferFolderMove: z.boolean().default(true),
  refine: z.boolean().default(true),
  sentinel: z.string().min(1).default(DEFAULT_SENTINEL_PATH),
  snapCutoff: z.number().min(0).max(1).default(TAXONOMY_SNAP_CUTOFF),
  maxWorkers: z.number().int().positive().optional(),
  pinnedRules: z.array(PinnedRuleSchema).default(() => DEFAULT_PINNED_RULES.map((rule) => ({ ...rule }))),
  aliasGroups: z.array(z.array(z.string().min(1)).min(2)).default(() => DEFAULT_ALIAS_GROUPS.map((group) => [...group])),
  leadInPhrases: z.array(z.string().min(1)).optional(),
  /** Overrides detection from the existing tree. */
  namingConvention: z.enum(['kebab-case', 'snake_case', 'PascalCase', 'unknown']).optional(),
  cache: CacheConfigSchema.default({}),
  journal: JournalConfigSchema.default({}),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>;

// ============================================================================
// Loading
// ============================================================================

export function parseResolverConfig(value: unknown, configPath: string = '(inline)'): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ResolverConfigError(`Invalid resolver config ${configPath}: ${issues}`, configPath);
  }
  return result.data;
}

/**
 * Load and validate a config file. A missing file yields the defaults;
 * unreadable or invalid content throws ResolverConfigError.
 */
export async function loadResolverConfig(configPath: string): Promise<ResolverConfig> {
  let text: string;
  try {
    text = await fs.promises.readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      console.log(`[ResolverConfig] No config at ${configPath}, using defaults`);
      return parseResolverConfig({}, configPath);
    }
    throw new ResolverConfigError(`Cannot read resolver config ${configPath}: ${String(error)}`, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ResolverConfigError(`Resolver config ${configPath} is not valid JSON: ${String(error)}`, configPath);
  }
  return parseResolverConfig(raw, configPath);
}

export function defaultConfigPath(rootPath: string): string {
  return path.join(rootPath, DEFAULT_CONFIG_FILE);
}

export function resolveCacheLocation(config: ResolverConfig, rootPath: string): string {
  if (config.cache.location) {
    return config.cache.location === ':memory:' ? ':memory:' : path.resolve(rootPath, config.cache.location);
  }
  return path.join(rootPath, config.cache.backend === 'sqlite' ? DEFAULT_CACHE_DB_FILE : DEFAULT_CACHE_FILE);
}

export function resolveJournalLocation(config: ResolverConfig, rootPath: string): string {
  return path.resolve(rootPath, config.journal.location ?? DEFAULT_JOURNAL_FILE);
}
