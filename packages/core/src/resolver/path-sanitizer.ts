import {
  DEFAULT_SENTINEL_PATH,
  MAX_PATH_LENGTH,
  MAX_PATH_SEGMENTS,
  MAX_SEGMENT_LENGTH,
  REJECTED_PATH_WORDS,
} from '../constants';

/**
 * Normalizes a path string into a safe, bounded relative path.
 * sanitizePath(sanitizePath(x)) === sanitizePath(x) for every input.
 */

const REJECTED = new Set<string>(REJECTED_PATH_WORDS);
const INVALID_CHARS = /[<>:"|?*]/g;
const PREFIX_PHRASE = /^(?:suggested path|folder path|path|folder)\s*:\s*/i;
const QUOTE_CHARS = new Set(['"', "'", '`']);
const SEGMENT_EDGES = /^[\s'`]+|[\s'`]+$/g;

function isRejected(value: string): boolean {
  const folded = value.trim().toLowerCase();
  return folded.length === 0 || REJECTED.has(folded);
}

function stripQuotePair(value: string): string {
  if (value.length >= 2 && value[0] === value[value.length - 1] && QUOTE_CHARS.has(value[0])) {
    return value.slice(1, -1).trim();
  }
  return value;
}

/**
 * Split a path into its non-empty segments. Dot-only segments ("." / "..") are dropped so a
 * suggestion can never climb out of the destination root.
 */
export function splitSegments(path: string): string[] {
  return path
    .split('/')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0 && !/^\.+$/.test(segment));
}

export function sanitizePath(input: string, sentinel: string = DEFAULT_SENTINEL_PATH): string {
  if (isRejected(input ?? '')) {
    return sentinel;
  }

  let candidate = stripQuotePair(input.trim());
  candidate = candidate.replace(PREFIX_PHRASE, '');
  candidate = candidate.replace(/\\/g, '/');
  candidate = candidate.replace(INVALID_CHARS, '');

  const segments = splitSegments(candidate)
    .slice(0, MAX_PATH_SEGMENTS)
    .map((segment) => segment.replace(SEGMENT_EDGES, ''))
    .filter((segment) => segment.length > 0 && !/^\.+$/.test(segment));

  if (segments.length === 0) {
    return sentinel;
  }

  if (
    segments.join('/').length > MAX_PATH_LENGTH ||
    segments.some((segment) => segment.length > MAX_SEGMENT_LENGTH)
  ) {
    return sentinel;
  }

  const result = segments.map((segment) => segment.replace(/\s+/g, ' ')).join('/');
  return isRejected(result) ? sentinel : result;
}

export function isSentinelPath(path: string, sentinel: string = DEFAULT_SENTINEL_PATH): boolean {
  return path.toLowerCase() === sentinel.toLowerCase();
}
