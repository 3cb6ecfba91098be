/**
 * ResolutionOrchestrator
 *
 * Drives each file through the suggest/refine protocol:
 *
 *   Pending -> (CacheHit | FirstPassQueried) -> GuardrailApplied
 *           -> [RefinementQueried -> GuardrailApplied] -> Resolved | Cancelled
 *
 * Workflow Context:
 * - resolve(): One file; never throws, always returns a usable path and a status
 * - resolveAll(): Every file through the worker pool; progress reported as files complete
 * - cancelAll(): Shared cancellation, observed at the start of a file, before each oracle call
 *   and between passes. A call already in flight runs to completion.
 *
 * Cache policy:
 * - Pinned files never reach the oracle
 * - A cache hit is final: neither pass runs (the hit is treated as already refined)
 * - One write per file, once it resolves: the refined path, or the first pass when refinement
 *   is off, empty or failed
 * - Failed and cancelled outcomes are never cached
 */
import type { FileEntry, ResolutionProgress, ResolutionResult, ResolutionStatus } from '../contracts';
import { OracleCancelledError } from '../oracle/errors';
import type { Oracle } from '../oracle/oracle';
import { fileSignature } from './file-signature';
import { applyGuardrails, findPinnedRule, pinnedPath } from './guardrail-policy';
import { sanitizePath, isSentinelPath } from './path-sanitizer';
import type { PromptContext } from './prompt-context';
import { buildPromptContext } from './prompt-context';
import type { ResolutionSession } from './resolution-session';
import { parsePathResponse } from './response-parser';
import { snapToTaxonomy } from './taxonomy-snapper';
import { defaultMaxWorkers, WorkerPool } from './worker-pool';

export type OrchestratorOptions = {
  /** Shared pool; defaults to one sized by config.maxWorkers. */
  pool?: WorkerPool;
};

export type ProgressCallback = (progress: ResolutionProgress, result: ResolutionResult) => void;

type PipelineResult = {
  path: string;
  /** True when the response held no usable path and the sentinel was substituted. */
  empty: boolean;
};

/**
 * parse -> sanitize -> guardrails -> snap for one oracle response.
 */
export async function resolveResponseText(
  text: string,
  file: Pick<FileEntry, 'name'>,
  session: ResolutionSession
): Promise<PipelineResult> {
  const { config, guardrails, snapshot } = session;
  const parsed = parsePathResponse(text, { leadInPhrases: config.leadInPhrases });
  const sanitized = sanitizePath(parsed, config.sentinel);
  const empty = isSentinelPath(sanitized, config.sentinel);

  const guarded = applyGuardrails(sanitized, file, guardrails);
  if (guarded.pinned) {
    return { path: guarded.path, empty: false };
  }

  const snapped = await snapToTaxonomy(guarded.path, snapshot, {
    rootName: guardrails.rootName,
    cutoff: config.snapCutoff,
  });
  return { path: snapped, empty };
}

export class ResolutionOrchestrator {
  private controller = new AbortController();
  private pool: WorkerPool;

  constructor(
    private session: ResolutionSession,
    private oracle: Oracle,
    options: OrchestratorOptions = {}
  ) {
    this.pool = options.pool ?? new WorkerPool(session.config.maxWorkers ?? defaultMaxWorkers());
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Stop starting new files, oracle calls and retries. In-flight calls are not interrupted.
   */
  cancelAll(): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    const stats = this.pool.getStats();
    console.log(`[ResolutionOrchestrator] Cancellation requested (${stats.active} active, ${stats.queued} queued)`);
  }

  /**
   * Clear a previous cancellation so a new scan can start with the same orchestrator.
   */
  resetCancellation(): void {
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
  }

  async resolveAll(files: readonly FileEntry[], onProgress?: ProgressCallback): Promise<ResolutionResult[]> {
    const total = files.length;
    let completed = 0;
    console.log(`[ResolutionOrchestrator] Resolving ${total} files with ${this.pool.getStats().max} workers`);

    const results = await Promise.all(
      files.map((file) =>
        this.pool.execute(async () => {
          const result = await this.resolve(file);
          completed++;
          try {
            onProgress?.({ completed, total, message: `${result.status}: ${file.relative_path} -> ${result.path}` }, result);
          } catch (error) {
            console.error(`[ResolutionOrchestrator] Progress callback failed for ${file.path}:`, error);
          }
          return result;
        }, file.relative_path)
      )
    );

    const counts = new Map<ResolutionStatus, number>();
    for (const result of results) {
      counts.set(result.status, (counts.get(result.status) ?? 0) + 1);
    }
    const summary = [...counts.entries()].map(([status, count]) => `${count} ${status}`).join(', ');
    console.log(`[ResolutionOrchestrator] Finished ${total} files: ${summary || 'nothing to do'}`);
    return results;
  }

  /**
   * Resolve one file. No error escapes; failures yield the sentinel with status "failed".
   */
  async resolve(file: FileEntry): Promise<ResolutionResult> {
    try {
      return await this.resolveFile(file);
    } catch (error) {
      if (error instanceof OracleCancelledError) {
        return this.cancelledResult(file);
      }
      console.error(`[ResolutionOrchestrator] Failed to resolve ${file.path}:`, error);
      return this.failedResult(file);
    }
  }

  private async resolveFile(file: FileEntry): Promise<ResolutionResult> {
    const { session } = this;
    const signal = this.controller.signal;

    if (signal.aborted) {
      return this.cancelledResult(file);
    }

    const rule = findPinnedRule(file.name, session.guardrails.pinnedRules);
    if (rule) {
      const path = pinnedPath(rule, session.guardrails.rootName);
      await this.remember(file, path, { pinned_rule: rule.id });
      return { sourcePath: file.path, path, status: 'pinned', outcome: { kind: 'resolved', path } };
    }

    const signature = fileSignature(file);
    const cached = session.cache.lookup(signature);
    if (cached) {
      const path = cached.resolved_path;
      return { sourcePath: file.path, path, status: 'cached', outcome: { kind: 'cache-hit', path } };
    }

    const context = await buildPromptContext(file, {
      rootName: session.rootName,
      snapshot: session.snapshot,
      reader: session.reader,
      projectType: session.project.projectType,
      namingConvention: session.guardrails.namingConvention,
    });

    // Pass 1
    if (signal.aborted) {
      return this.cancelledResult(file);
    }
    const firstText = await this.oracle.suggest(context, { cancelSignal: signal });
    const first = await resolveResponseText(firstText, file, session);
    await this.journal(file, context, first.path, null, 'ai-suggested');

    if (!session.config.refine) {
      await this.remember(file, first.path, this.contextSnapshot(context));
      return this.resolvedResult(file, first.path, 'ai-suggested');
    }

    // Pass 2
    if (signal.aborted) {
      return this.cancelledResult(file);
    }
    const refined = await this.refine(file, context, first.path);
    if (refined === null) {
      await this.journal(file, context, first.path, first.path, 'ai-suggested');
      await this.remember(file, first.path, this.contextSnapshot(context));
      return this.resolvedResult(file, first.path, 'ai-suggested');
    }

    await this.journal(file, context, first.path, refined, 'refined');
    await this.remember(file, refined, { ...this.contextSnapshot(context), first_path: first.path });
    return this.resolvedResult(file, refined, 'refined');
  }

  /**
   * Second pass. Returns null when refinement gave nothing usable or the call failed;
   * the caller keeps the first-pass path in that case.
   */
  private async refine(file: FileEntry, context: PromptContext, firstPath: string): Promise<string | null> {
    let text: string;
    try {
      text = await this.oracle.refine(context, firstPath, { cancelSignal: this.controller.signal });
    } catch (error) {
      if (error instanceof OracleCancelledError) {
        throw error;
      }
      console.warn(`[ResolutionOrchestrator] Refinement failed for ${file.path}, keeping "${firstPath}":`, error);
      return null;
    }

    const refined = await resolveResponseText(text, file, this.session);
    if (refined.empty) {
      return null;
    }
    // Same folder up to case: keep the first-pass spelling exactly
    if (refined.path.toLowerCase() === firstPath.toLowerCase()) {
      return firstPath;
    }
    return refined.path;
  }

  private contextSnapshot(context: PromptContext): Record<string, string> {
    return {
      root: context.rootName,
      hint: context.hint,
      project_type: context.projectType,
      naming_convention: context.namingConvention,
      oracle: this.oracle.provider,
    };
  }

  private async remember(file: FileEntry, path: string, contextSnapshot: Record<string, string>): Promise<void> {
    const signature = fileSignature(file);
    await this.session.cache.store(signature, {
      signature,
      resolved_path: path,
      source_file_path: file.path,
      timestamp: Date.now(),
      context_snapshot: contextSnapshot,
    });
  }

  private async journal(
    file: FileEntry,
    context: PromptContext,
    firstPath: string,
    refinedPath: string | null,
    status: ResolutionStatus
  ): Promise<void> {
    if (!this.session.journal) return;
    await this.session.journal.append({
      ts: Date.now(),
      source: file.path,
      hint: context.hint,
      first_path: firstPath,
      refined_path: refinedPath,
      status,
    });
  }

  private resolvedResult(file: FileEntry, path: string, status: ResolutionStatus): ResolutionResult {
    return { sourcePath: file.path, path, status, outcome: { kind: 'resolved', path } };
  }

  private cancelledResult(file: FileEntry): ResolutionResult {
    return {
      sourcePath: file.path,
      path: this.session.config.sentinel,
      status: 'cancelled',
      outcome: { kind: 'cancelled' },
    };
  }

  private failedResult(file: FileEntry): ResolutionResult {
    const { path } = applyGuardrails(this.session.config.sentinel, { name: file.name }, this.session.guardrails);
    return { sourcePath: file.path, path, status: 'failed', outcome: { kind: 'resolved', path } };
  }
}
