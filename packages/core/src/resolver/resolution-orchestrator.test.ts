import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { SuggestionCache } from '../cache/suggestion-cache';
import type { SuggestionStore } from '../cache/suggestion-store';
import type { ResolverConfigInput } from '../config/resolver-config';
import { parseResolverConfig } from '../config/resolver-config';
import type { FileEntry, SuggestionRecord } from '../contracts';
import { MemoryDirectoryReader } from '../test-support/directory-readers';
import { ScanJournal } from '../journal/scan-journal';
import { OracleCallError } from '../oracle/errors';
import type { Oracle, OracleRequestOptions } from '../oracle/oracle';
import type { PromptContext } from './prompt-context';
import { fileSignature } from './file-signature';
import { ResolutionOrchestrator, resolveResponseText } from './resolution-orchestrator';
import type { ResolutionSession } from './resolution-session';
import { createResolutionSession } from './resolution-session';
import { WorkerPool } from './worker-pool';

const ROOT = path.resolve('/virtual/Home');

class MemorySuggestionStore implements SuggestionStore {
  readonly location = 'memory';
  records = new Map<string, SuggestionRecord>();

  async readAll(): Promise<SuggestionRecord[]> {
    return [...this.records.values()];
  }

  async put(record: SuggestionRecord): Promise<void> {
    this.records.set(record.signature, record);
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}

class FakeOracle implements Oracle {
  readonly provider = 'ollama' as const;
  suggest = vi.fn(async (_context: PromptContext, _options?: OracleRequestOptions): Promise<string> => 'Docments/Taxes');
  refine = vi.fn(
    async (_context: PromptContext, candidate: string, _options?: OracleRequestOptions): Promise<string> => candidate
  );
}

function makeFile(relativePath: string, size = 100): FileEntry {
  const name = path.posix.basename(relativePath);
  return {
    path: path.join(ROOT, ...relativePath.split('/')),
    name,
    extension: path.extname(name).toLowerCase(),
    size,
    mtimeMs: 1000,
    relative_path: relativePath,
  };
}

async function makeSession(
  config: ResolverConfigInput = {},
  journal: ScanJournal | null = null
): Promise<ResolutionSession> {
  const reader = new MemoryDirectoryReader(ROOT, [
    'Documents/Taxes 2023/',
    'Pictures/',
    'inbox/report.pdf',
    'inbox/photo.jpg',
    'inbox/main.tf',
  ]);
  const cache = await SuggestionCache.open(new MemorySuggestionStore());
  return createResolutionSession({
    rootPath: ROOT,
    config: parseResolverConfig({ maxWorkers: 2, ...config }),
    cache,
    reader,
    journal,
  });
}

describe('ResolutionOrchestrator', () => {
  let oracle: FakeOracle;

  beforeEach(() => {
    oracle = new FakeOracle();
  });

  it('snaps the first pass and keeps it when refinement agrees', async () => {
    const session = await makeSession();
    const orchestrator = new ResolutionOrchestrator(session, oracle);
    const file = makeFile('inbox/report.pdf');

    const result = await orchestrator.resolve(file);

    expect(result).toEqual({
      sourcePath: file.path,
      path: 'Home/Documents/Taxes',
      status: 'refined',
      outcome: { kind: 'resolved', path: 'Home/Documents/Taxes' },
    });
    expect(oracle.refine).toHaveBeenCalledWith(expect.anything(), 'Home/Documents/Taxes', expect.anything());
    expect(session.cache.lookup(fileSignature(file))?.resolved_path).toBe('Home/Documents/Taxes');
  });

  it('keeps the first-pass casing when refinement differs only in case', async () => {
    const session = await makeSession();
    oracle.refine.mockResolvedValueOnce('home/documents/taxes');

    const result = await new ResolutionOrchestrator(session, oracle).resolve(makeFile('inbox/report.pdf'));

    expect(result.path).toBe('Home/Documents/Taxes');
    expect(result.status).toBe('refined');
  });

  it('adopts a different refined path and caches it', async () => {
    const session = await makeSession();
    oracle.refine.mockResolvedValueOnce('Pictures/Receipts');
    const file = makeFile('inbox/report.pdf');

    const result = await new ResolutionOrchestrator(session, oracle).resolve(file);

    expect(result.path).toBe('Home/Pictures/Receipts');
    expect(session.cache.lookup(fileSignature(file))?.resolved_path).toBe('Home/Pictures/Receipts');
  });

  it('keeps the first pass when refinement has no usable path', async () => {
    const session = await makeSession();
    oracle.refine.mockResolvedValueOnce('none');

    const result = await new ResolutionOrchestrator(session, oracle).resolve(makeFile('inbox/report.pdf'));

    expect(result).toMatchObject({ path: 'Home/Documents/Taxes', status: 'ai-suggested' });
  });

  it('keeps the first pass when refinement fails', async () => {
    const session = await makeSession();
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    oracle.refine.mockRejectedValueOnce(new OracleCallError('Error after 4 attempts: timeout', { transient: true, attempts: 4 }));

    const result = await new ResolutionOrchestrator(session, oracle).resolve(makeFile('inbox/report.pdf'));

    expect(result).toMatchObject({ path: 'Home/Documents/Taxes', status: 'ai-suggested' });
    warn.mockRestore();
  });

  it('skips refinement when it is turned off', async () => {
    const session = await makeSession({ refine: false });

    const result = await new ResolutionOrchestrator(session, oracle).resolve(makeFile('inbox/report.pdf'));

    expect(result.status).toBe('ai-suggested');
    expect(oracle.refine).not.toHaveBeenCalled();
  });

  it('returns the root-contained sentinel and caches nothing when the oracle fails', async () => {
    const session = await makeSession();
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    oracle.suggest.mockRejectedValueOnce(new OracleCallError('Error after 4 attempts: ECONNREFUSED', { transient: true, attempts: 4 }));
    const file = makeFile('inbox/report.pdf');

    const result = await new ResolutionOrchestrator(session, oracle).resolve(file);

    expect(result).toEqual({
      sourcePath: file.path,
      path: 'Home/Uncategorized',
      status: 'failed',
      outcome: { kind: 'resolved', path: 'Home/Uncategorized' },
    });
    expect(session.cache.lookup(fileSignature(file))).toBeUndefined();
    error.mockRestore();
  });

  it('pins terraform files without asking the oracle', async () => {
    const session = await makeSession();
    oracle.suggest.mockResolvedValue('Pictures/Cats');

    const result = await new ResolutionOrchestrator(session, oracle).resolve(makeFile('inbox/main.tf'));

    expect(result).toMatchObject({ path: 'Home/infrastructure/terraform', status: 'pinned' });
    expect(oracle.suggest).not.toHaveBeenCalled();
  });

  it('short-circuits both passes on a cache hit', async () => {
    const session = await makeSession();
    const file = makeFile('inbox/report.pdf');
    const signature = fileSignature(file);
    await session.cache.store(signature, {
      signature,
      resolved_path: 'Home/Archive',
      source_file_path: file.path,
      timestamp: 1,
      context_snapshot: {},
    });

    const result = await new ResolutionOrchestrator(session, oracle).resolve(file);

    expect(result).toEqual({
      sourcePath: file.path,
      path: 'Home/Archive',
      status: 'cached',
      outcome: { kind: 'cache-hit', path: 'Home/Archive' },
    });
    expect(oracle.suggest).not.toHaveBeenCalled();
    expect(oracle.refine).not.toHaveBeenCalled();
  });

  it('makes no oracle call after cancellation', async () => {
    const session = await makeSession();
    const orchestrator = new ResolutionOrchestrator(session, oracle);
    orchestrator.cancelAll();
    const file = makeFile('inbox/report.pdf');

    const result = await orchestrator.resolve(file);

    expect(result).toEqual({
      sourcePath: file.path,
      path: 'Uncategorized',
      status: 'cancelled',
      outcome: { kind: 'cancelled' },
    });
    expect(oracle.suggest).not.toHaveBeenCalled();
    expect(session.cache.lookup(fileSignature(file))).toBeUndefined();
  });

  it('observes cancellation between passes', async () => {
    const session = await makeSession();
    const orchestrator = new ResolutionOrchestrator(session, oracle);
    oracle.suggest.mockImplementationOnce(async () => {
      orchestrator.cancelAll();
      return 'Documents';
    });

    const file = makeFile('inbox/report.pdf');

    const result = await orchestrator.resolve(file);

    expect(result.status).toBe('cancelled');
    expect(oracle.refine).not.toHaveBeenCalled();
    expect(session.cache.lookup(fileSignature(file))).toBeUndefined();
  });

  it('refines a file on the next scan after it was cancelled between passes', async () => {
    const session = await makeSession();
    const file = makeFile('inbox/report.pdf');
    const first = new ResolutionOrchestrator(session, oracle);
    oracle.suggest.mockImplementationOnce(async () => {
      first.cancelAll();
      return 'Documents/Drafts';
    });
    await first.resolve(file);

    const result = await new ResolutionOrchestrator(session, oracle).resolve(file);

    expect(result).toMatchObject({ path: 'Home/Documents/Taxes', status: 'refined' });
    expect(oracle.refine).toHaveBeenCalledTimes(1);
  });

  it('starts fresh after resetCancellation', async () => {
    const session = await makeSession({ refine: false });
    const orchestrator = new ResolutionOrchestrator(session, oracle);
    orchestrator.cancelAll();
    orchestrator.resetCancellation();

    const result = await orchestrator.resolve(makeFile('inbox/report.pdf'));

    expect(result.status).toBe('ai-suggested');
  });

  it('resolves a batch through the pool and reports progress', async () => {
    const session = await makeSession({ refine: false });
    const orchestrator = new ResolutionOrchestrator(session, oracle, { pool: new WorkerPool(2) });
    const files = [makeFile('inbox/report.pdf'), makeFile('inbox/photo.jpg'), makeFile('inbox/main.tf')];
    const progress: Array<{ completed: number; total: number }> = [];

    const results = await orchestrator.resolveAll(files, ({ completed, total }) => progress.push({ completed, total }));

    expect(results.map((result) => result.status)).toEqual(['ai-suggested', 'ai-suggested', 'pinned']);
    expect(results.map((result) => result.sourcePath)).toEqual(files.map((file) => file.path));
    expect(progress.map((entry) => entry.completed).sort()).toEqual([1, 2, 3]);
    expect(progress.every((entry) => entry.total === 3)).toBe(true);
  });

  it('starts no oracle call once a running batch is cancelled', async () => {
    const session = await makeSession({ refine: false });
    const orchestrator = new ResolutionOrchestrator(session, oracle, { pool: new WorkerPool(1) });
    oracle.suggest
      .mockImplementationOnce(async () => 'Docments/Taxes')
      .mockImplementationOnce(async () => {
        orchestrator.cancelAll();
        return 'Documents';
      });
    const files = [makeFile('inbox/report.pdf'), makeFile('inbox/notes.txt'), makeFile('inbox/photo.jpg')];

    const results = await orchestrator.resolveAll(files);

    expect(oracle.suggest).toHaveBeenCalledTimes(2);
    expect(results.map(({ path, status }) => ({ path, status }))).toEqual([
      { path: 'Home/Documents/Taxes', status: 'ai-suggested' },
      { path: 'Home/Documents', status: 'ai-suggested' },
      { path: 'Uncategorized', status: 'cancelled' },
    ]);
  });

  it('finishes the batch when the progress callback throws', async () => {
    const session = await makeSession({ refine: false });
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const orchestrator = new ResolutionOrchestrator(session, oracle, { pool: new WorkerPool(2) });

    const results = await orchestrator.resolveAll([makeFile('inbox/report.pdf'), makeFile('inbox/main.tf')], () => {
      throw new Error('listener failed');
    });

    expect(results.map((result) => result.status)).toEqual(['ai-suggested', 'pinned']);
    expect(error).toHaveBeenCalledTimes(2);
    error.mockRestore();
  });

  it('cancels a whole batch', async () => {
    const session = await makeSession();
    const orchestrator = new ResolutionOrchestrator(session, oracle, { pool: new WorkerPool(2) });
    orchestrator.cancelAll();

    const results = await orchestrator.resolveAll([makeFile('inbox/report.pdf'), makeFile('inbox/photo.jpg')]);

    expect(results.map((result) => result.status)).toEqual(['cancelled', 'cancelled']);
    expect(oracle.suggest).not.toHaveBeenCalled();
  });
});

describe('ResolutionOrchestrator journal', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-journal-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('records the first pass and the final outcome', async () => {
    const journal = new ScanJournal(path.join(dir, 'scan.jsonl'));
    const session = await makeSession({}, journal);
    const file = makeFile('inbox/report.pdf');

    await new ResolutionOrchestrator(session, new FakeOracle()).resolve(file);

    const entries = await journal.readAll();
    expect(entries.map(({ ts: _ts, ...rest }) => rest)).toEqual([
      {
        source: file.path,
        hint: 'Type=Doc; Name=report.pdf; Parent=inbox; Ancestors=Home/inbox',
        first_path: 'Home/Documents/Taxes',
        refined_path: null,
        status: 'ai-suggested',
      },
      {
        source: file.path,
        hint: 'Type=Doc; Name=report.pdf; Parent=inbox; Ancestors=Home/inbox',
        first_path: 'Home/Documents/Taxes',
        refined_path: 'Home/Documents/Taxes',
        status: 'refined',
      },
    ]);
  });
});

describe('resolveResponseText', () => {
  it('runs parse, sanitize, guardrails and snapping', async () => {
    const session = await makeSession();

    expect(await resolveResponseText('```\nsrc/utils\n```', { name: 'a.ts' }, session)).toEqual({
      path: 'Home/src/utils',
      empty: false,
    });
    expect(await resolveResponseText('The path would be pictures/2024', { name: 'a.jpg' }, session)).toEqual({
      path: 'Home/Pictures/2024',
      empty: false,
    });
  });

  it('flags responses without a usable path', async () => {
    const session = await makeSession();

    expect(await resolveResponseText('Error: model not found', { name: 'a.pdf' }, session)).toEqual({
      path: 'Home/Uncategorized',
      empty: true,
    });
  });
});

describe('createResolutionSession', () => {
  it('derives the root name, naming convention and top-level folders', async () => {
    const session = await makeSession();

    expect(session.rootName).toBe('Home');
    expect(session.guardrails.namingConvention).toBe('PascalCase');
    expect(session.guardrails.existingTopLevel).toEqual(['Documents', 'Pictures', 'inbox']);
    expect(session.project).toEqual({ projectType: 'general', isProject: false, markers: [] });
  });

  it('prefers configured values', async () => {
    const session = await makeSession({ rootName: 'Archive', namingConvention: 'kebab-case' });

    expect(session.guardrails.rootName).toBe('Archive');
    expect(session.guardrails.namingConvention).toBe('kebab-case');
  });
});
