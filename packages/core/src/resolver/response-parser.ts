/**
 * ResponseParser
 *
 * Extracts a best-effort folder path from raw oracle text.
 * Handles common model habits: JSON envelopes, markdown fences, reasoning tags, headings and
 * prose lead-ins ("the path would be ...").
 *
 * Workflow Context:
 * - parsePathResponse: First step after every oracle call (suggest and refine passes)
 * - repairJson: Fixes trailing commas / raw newlines before JSON.parse
 * - Output feeds sanitizePath(); an empty string means "no suggestion" and becomes the sentinel
 *
 * Never throws.
 */
import { z } from 'zod';
import {
  PARSER_EXTRA_WORD_PENALTY,
  PARSER_FALLBACK_LINE_MAX_LENGTH,
  PARSER_IDENTIFIER_BONUS,
  PARSER_LENGTH_BUDGET,
  PARSER_MAX_FREE_WORDS,
  PARSER_SLASH_BONUS,
  PARSER_STOP_WORDS,
  PARSER_STOP_WORD_PENALTY,
} from '../constants';

export type PathCandidate = {
  text: string;
  score: number;
};

export type ParseOptions = {
  /** Prose lead-ins removed before candidate extraction. Defaults to DEFAULT_LEAD_IN_PHRASES. */
  leadInPhrases?: readonly string[];
};

export const DEFAULT_LEAD_IN_PHRASES: readonly string[] = [
  'the cleaned compact path would be',
  'the path would be',
  'the best path is',
  'the folder would be',
  'final path',
  'this file should go in',
  'this belongs in',
  'organize this as',
  'suggested organization',
  'recommended location',
  'i would suggest',
  'i suggest',
];

const ERROR_MARKER = /^\s*(?:(?:openai|grok|ollama)\s+)?error(?:\s+after\s+\d+\s+attempts?)?\s*:/i;
const JSON_OBJECT = /\{[^{}]*\}/g;
const CODE_FENCE = /```[^\n`]*\n?/g;
const REASONING_BLOCK = /<(think|thinking|reasoning|analysis)>[\s\S]*?<\/\1>/gi;
const ANY_TAG = /<\/?[A-Za-z][\w-]*[^>]*>/g;
const HEADING_LINE = /^#+\s.*$/gm;
const PATH_GRAMMAR = /[A-Za-z0-9 _.-]+(?:\/[A-Za-z0-9 _.-]+){0,2}/g;
const STRICT_SEGMENT = /^[A-Za-z][A-Za-z0-9_-]*$/;

const JsonEnvelopeSchema = z.record(z.string(), z.unknown());

/**
 * True when the response is an error report rather than an answer
 * ("Error: ...", "OpenAI Error: ...", "Error after 4 attempts: ...").
 */
export function isErrorResponse(text: string): boolean {
  return ERROR_MARKER.test(text);
}

/**
 * Try to repair common LLM JSON mistakes: trailing commas, unescaped newlines in strings.
 */
export function repairJson(jsonText: string): string {
  const out = jsonText.replace(/,(\s*[}\]])/g, '$1');

  let inString = false;
  let escape = false;
  const result: string[] = [];
  for (const c of out) {
    if (escape) {
      result.push(c);
      escape = false;
      continue;
    }
    if (c === '\\' && inString) {
      result.push(c);
      escape = true;
      continue;
    }
    if (c === '"') {
      inString = !inString;
      result.push(c);
      continue;
    }
    if (inString && (c === '\n' || c === '\r')) {
      result.push(' ');
      continue;
    }
    result.push(c);
  }
  return result.join('');
}

function readPathKey(jsonText: string): string | null {
  for (const text of [jsonText, repairJson(jsonText)]) {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      continue;
    }
    const parsed = JsonEnvelopeSchema.safeParse(value);
    if (!parsed.success) return null;
    for (const [key, entry] of Object.entries(parsed.data)) {
      if (key.toLowerCase() === 'path' && typeof entry === 'string' && entry.trim()) {
        return entry.trim();
      }
    }
    return null;
  }
  return null;
}

/**
 * Look for a JSON object carrying a "path" key (any casing). Returns the trimmed value.
 */
export function extractJsonPath(text: string): string | null {
  for (const match of text.matchAll(JSON_OBJECT)) {
    const found = readPathKey(match[0]);
    if (found) return found;
  }
  return null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove fences, reasoning blocks, tags, headings and lead-in phrases.
 * Fenced content is kept: models often fence the answer itself.
 */
export function stripResponseNoise(text: string, leadInPhrases: readonly string[]): string {
  let cleaned = text
    .replace(REASONING_BLOCK, '')
    .replace(CODE_FENCE, '')
    .replace(ANY_TAG, '')
    .replace(/`/g, '')
    .replace(HEADING_LINE, '');

  for (const phrase of leadInPhrases) {
    const pattern = new RegExp(`\\b${escapeRegExp(phrase)}\\b\\s*:?`, 'gi');
    cleaned = cleaned.replace(pattern, ' ');
  }
  return cleaned;
}

/**
 * Score a path candidate; higher is more path-like.
 */
export function scoreCandidate(candidate: string): number {
  let score = 0;

  if (candidate.includes('/')) {
    score += PARSER_SLASH_BONUS;
  }

  score += Math.max(0, PARSER_LENGTH_BUDGET - candidate.length);

  const lower = candidate.toLowerCase();
  for (const word of PARSER_STOP_WORDS) {
    if (new RegExp(`\\b${word}\\b`).test(lower)) {
      score -= PARSER_STOP_WORD_PENALTY;
    }
  }

  const wordCount = candidate.split(/\s+/).filter(Boolean).length;
  if (wordCount > PARSER_MAX_FREE_WORDS) {
    score -= (wordCount - PARSER_MAX_FREE_WORDS) * PARSER_EXTRA_WORD_PENALTY;
  }

  if (candidate.split('/').every((segment) => STRICT_SEGMENT.test(segment))) {
    score += PARSER_IDENTIFIER_BONUS;
  }

  return score;
}

/**
 * All substrings matching the path grammar, scored in order of appearance.
 */
export function collectCandidates(text: string): PathCandidate[] {
  const candidates: PathCandidate[] = [];
  for (const match of text.matchAll(PATH_GRAMMAR)) {
    const candidate = match[0].trim().replace(/\.+$/, '').trim();
    if (!candidate) continue;
    candidates.push({ text: candidate, score: scoreCandidate(candidate) });
  }
  return candidates;
}

/**
 * Parse an oracle response into a path string.
 * Returns '' when nothing usable is found (the sanitizer maps it to the sentinel).
 */
export function parsePathResponse(text: string, options: ParseOptions = {}): string {
  if (!text || !text.trim()) return '';

  try {
    if (isErrorResponse(text)) {
      return '';
    }

    const fromJson = extractJsonPath(text);
    if (fromJson) {
      return fromJson;
    }

    const cleaned = stripResponseNoise(text, options.leadInPhrases ?? DEFAULT_LEAD_IN_PHRASES);

    let best: PathCandidate | null = null;
    for (const candidate of collectCandidates(cleaned)) {
      if (candidate.score > 0 && (!best || candidate.score > best.score)) {
        best = candidate;
      }
    }
    if (best) {
      return best.text;
    }

    for (const rawLine of cleaned.split('\n')) {
      const line = rawLine.trim();
      if (line.includes('/') && line.length < PARSER_FALLBACK_LINE_MAX_LENGTH) {
        return line;
      }
    }
  } catch (error) {
    console.warn('[ResponseParser] Unexpected failure while parsing oracle response:', error);
  }

  return '';
}
