import { z } from 'zod';

// ============================================================================
// File Entry Schema
// ============================================================================

export const FileEntrySchema = z.object({
  path: z.string(), // absolute path on disk
  name: z.string(),
  extension: z.string(), // lowercase, with leading "." ("" when none)
  size: z.number(),
  mtimeMs: z.number(),
  relative_path: z.string(), // path relative to the scan root
});

export type FileEntry = z.infer<typeof FileEntrySchema>;

// ============================================================================
// Suggestion Record Schema (persisted by the suggestion cache)
// ============================================================================

export const SuggestionRecordSchema = z.object({
  signature: z.string(), // name|size|mtime
  resolved_path: z.string(),
  source_file_path: z.string(),
  timestamp: z.number(), // Unix timestamp in ms
  context_snapshot: z.record(z.string(), z.string()),
});

export type SuggestionRecord = z.infer<typeof SuggestionRecordSchema>;

/**
 * On-disk layout of the JSON suggestion store.
 * Entries are keyed by signature; the record repeats it so a single entry is self-describing.
 */
export const SuggestionFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), SuggestionRecordSchema),
});

export type SuggestionFile = z.infer<typeof SuggestionFileSchema>;

// ============================================================================
// Resolution Schemas
// ============================================================================

export const ResolutionStatusSchema = z.enum([
  'ai-suggested',
  'refined',
  'cached',
  'pinned',
  'failed',
  'cancelled',
]);

export type ResolutionStatus = z.infer<typeof ResolutionStatusSchema>;

export const ResolutionOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('resolved'), path: z.string() }),
  z.object({ kind: z.literal('cache-hit'), path: z.string() }),
  z.object({ kind: z.literal('cancelled') }),
]);

export type ResolutionOutcome = z.infer<typeof ResolutionOutcomeSchema>;

export const ResolutionResultSchema = z.object({
  sourcePath: z.string(),
  path: z.string(), // always a usable relative path (possibly the sentinel)
  status: ResolutionStatusSchema,
  outcome: ResolutionOutcomeSchema,
});

export type ResolutionResult = z.infer<typeof ResolutionResultSchema>;

// resolveAll progress
export const ResolutionProgressSchema = z.object({
  completed: z.number(),
  total: z.number(),
  message: z.string(),
});

export type ResolutionProgress = z.infer<typeof ResolutionProgressSchema>;

// ============================================================================
// Scan Journal Schema
// ============================================================================

export const JournalEntrySchema = z.object({
  ts: z.number(),
  source: z.string(),
  hint: z.string(),
  first_path: z.string().nullable(),
  refined_path: z.string().nullable(),
  status: z.string(),
});

export type JournalEntry = z.infer<typeof JournalEntrySchema>;
