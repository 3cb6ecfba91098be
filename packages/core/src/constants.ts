/**
 * Configuration constants for the resolver, cache and oracle layers.
 * All thresholds, limits, and parameters are defined here for easy adjustment.
 *
 * Change ONE number here, and it updates everywhere automatically.
 */

// ============================================================================
// PATH SHAPE
// ============================================================================

/** Fallback path returned whenever no confident suggestion exists. */
export const DEFAULT_SENTINEL_PATH = 'Uncategorized';

/** Maximum number of slash-separated segments in any resolved path. */
export const MAX_PATH_SEGMENTS = 3;

/** Maximum total length (characters) of a sanitized path. */
export const MAX_PATH_LENGTH = 200;

/** Maximum length (characters) of a single segment. */
export const MAX_SEGMENT_LENGTH = 50;

/** Answers that mean "no suggestion" when they are the whole response. */
export const REJECTED_PATH_WORDS = ['error', 'none', 'null', 'undefined', 'unknown'] as const;

// ============================================================================
// RESPONSE PARSING
// ============================================================================

/** Bonus for a candidate containing a slash. */
export const PARSER_SLASH_BONUS = 10;

/** Length budget: candidates earn (budget - length) points, floored at 0. */
export const PARSER_LENGTH_BUDGET = 20;

/** Penalty per prose stop word found in a candidate. */
export const PARSER_STOP_WORD_PENALTY = 2;

/** Words allowed in a candidate before the per-word penalty applies. */
export const PARSER_MAX_FREE_WORDS = 6;

/** Penalty per word beyond PARSER_MAX_FREE_WORDS. */
export const PARSER_EXTRA_WORD_PENALTY = 2;

/** Bonus when every segment is a strict identifier. */
export const PARSER_IDENTIFIER_BONUS = 5;

/** Fallback scan only accepts lines shorter than this. */
export const PARSER_FALLBACK_LINE_MAX_LENGTH = 50;

export const PARSER_STOP_WORDS = ['is', 'are', 'the', 'this', 'that', 'here', 'would', 'should', 'could'] as const;

// ============================================================================
// TAXONOMY
// ============================================================================

/** Normalized similarity a suggested segment must reach to snap to an existing folder. */
export const TAXONOMY_SNAP_CUTOFF = 0.8;

/** Depth of the initial taxonomy walk (deeper ancestors are read lazily). */
export const TAXONOMY_SNAPSHOT_MAX_DEPTH = 3;

/** Prompt sampling limits. */
export const TAXONOMY_PROMPT_MAX_PARENTS = 12; // Top-level folders shown to the oracle
export const TAXONOMY_PROMPT_MAX_CHILDREN = 8; // Children shown per top-level folder
export const NEIGHBOR_PROMPT_MAX_SIBLINGS = 12; // Sibling files/dirs shown per file

/** Ancestors of the file included in its hint. */
export const FILE_HINT_MAX_ANCESTORS = 4;

// ============================================================================
// ORACLE & TIMEOUT SETTINGS
// ============================================================================

/**
 * Oracle call timeouts (milliseconds).
 */
export const ORACLE_LOCAL_TIMEOUT_MS = 30000; // Local model (Ollama)
export const ORACLE_HOSTED_TIMEOUT_MS = 60000; // Hosted APIs

/**
 * Retry policy for transient oracle failures.
 */
export const ORACLE_MAX_RETRIES = 3;
export const ORACLE_RETRY_BASE_DELAY_MS = 1000; // Doubles after every attempt

/**
 * Completion settings. A path never needs more than a handful of tokens.
 */
export const ORACLE_MAX_TOKENS = 50;
export const ORACLE_TEMPERATURE = 0.1;
export const ORACLE_STOP_SEQUENCES = ['\n\n', 'Path:', 'Folder:', 'Response:'];

// ============================================================================
// WORKER POOL
// ============================================================================

export const WORKER_POOL_MIN_WORKERS = 4;

/** Workers running longer than this are reported as slow. */
export const WORKER_POOL_SLOW_TASK_MS = 30000;

// ============================================================================
// MOVE PLANNING
// ============================================================================

/** Groups larger than this are candidates for a whole-folder move. */
export const MOVE_PLAN_MIN_GROUP_SIZE = 4;

/** Share of a group that must agree on the destination prefix. */
export const MOVE_PLAN_AGREEMENT_RATIO = 0.6;

/** Segments compared when deciding whether a group agrees. */
export const MOVE_PLAN_PREFIX_DEPTH = 2;

// ============================================================================
// STORAGE
// ============================================================================

export const DEFAULT_CONFIG_FILE = 'pathwise.config.json';
export const DEFAULT_CACHE_FILE = '.pathwise/history.json';
export const DEFAULT_CACHE_DB_FILE = '.pathwise/history.db';
export const DEFAULT_JOURNAL_FILE = '.pathwise/scan-journal.jsonl';
