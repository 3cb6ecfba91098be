/**
 * TaxonomySnapper
 *
 * Prevents near-duplicate folders ("Docments" next to "Documents") by snapping every post-root
 * segment to the closest existing sibling directory.
 *
 * Workflow Context:
 * - snapToTaxonomy: Last step of the per-pass pipeline (parse → sanitize → guardrails → snap)
 * - Walks segments left to right; the ancestor advances with the (possibly substituted) name
 * - Fail-open: any read failure keeps the suggested segment unchanged
 */
import { MAX_PATH_SEGMENTS, TAXONOMY_SNAP_CUTOFF } from '../constants';
import type { TaxonomySnapshot } from '../indexer/taxonomy-snapshot';
import { joinRelative } from '../indexer/taxonomy-snapshot';
import { splitSegments } from './path-sanitizer';

export type SnapOptions = {
  rootName: string;
  cutoff?: number;
};

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Case-insensitive normalized similarity in [0, 1]; 1 means identical.
 */
export function similarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - levenshteinDistance(left, right) / longest;
}

/**
 * Closest candidate reaching the cutoff; ties keep the first candidate.
 */
export function findClosestMatch(
  segment: string,
  candidates: readonly string[],
  cutoff: number = TAXONOMY_SNAP_CUTOFF
): string | null {
  let best: string | null = null;
  let bestScore = cutoff;
  for (const candidate of candidates) {
    const score = similarity(segment, candidate);
    if (score > bestScore || (best === null && score === bestScore)) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

export async function snapToTaxonomy(
  path: string,
  snapshot: TaxonomySnapshot,
  options: SnapOptions
): Promise<string> {
  const cutoff = options.cutoff ?? TAXONOMY_SNAP_CUTOFF;
  const segments = splitSegments(path).slice(0, MAX_PATH_SEGMENTS);
  if (segments.length === 0) return path;

  const hasRoot = segments[0].toLowerCase() === options.rootName.toLowerCase();
  const snapped: string[] = hasRoot ? [segments[0]] : [];
  let ancestor = '';
  let ancestorExists = true;

  for (const segment of segments.slice(hasRoot ? 1 : 0)) {
    let chosen = segment;
    if (ancestorExists) {
      try {
        const children = await snapshot.childDirectories(ancestor);
        const match = findClosestMatch(segment, children, cutoff);
        if (match) {
          chosen = match;
        } else {
          // A new folder; nothing below it exists yet
          ancestorExists = false;
        }
      } catch (error) {
        console.warn(`[TaxonomySnapper] Keeping "${segment}" after lookup failure:`, error);
        ancestorExists = false;
      }
    }
    snapped.push(chosen);
    ancestor = joinRelative(ancestor, chosen);
  }

  return snapped.join('/');
}
