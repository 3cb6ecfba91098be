/**
 * Folder naming-convention detection and rewriting.
 *
 * Workflow Context:
 * - detectNamingConvention: Run once per scan over the taxonomy snapshot's folder names
 * - applyNamingConvention: Used by the guardrail policy on generated (non-root) segments
 */

export type NamingConvention = 'kebab-case' | 'snake_case' | 'PascalCase' | 'unknown';

const KEBAB = /^[a-z]+[a-z0-9-]*$/;
const PASCAL = /^[A-Z][a-zA-Z0-9]*$/;
const SNAKE = /^[a-z][a-z0-9_]*$/;

export function classifyFolderName(name: string): NamingConvention {
  if (KEBAB.test(name)) return 'kebab-case';
  if (PASCAL.test(name)) return 'PascalCase';
  if (SNAKE.test(name)) return 'snake_case';
  return 'unknown';
}

/**
 * Dominant convention among the given folder names. Ties keep the first style to reach the count.
 */
export function detectNamingConvention(folderNames: Iterable<string>): NamingConvention {
  const counts = new Map<NamingConvention, number>();
  let dominant: NamingConvention = 'unknown';
  let max = 0;

  for (const name of folderNames) {
    const style = classifyFolderName(name);
    if (style === 'unknown') continue;
    const count = (counts.get(style) ?? 0) + 1;
    counts.set(style, count);
    if (count > max) {
      max = count;
      dominant = style;
    }
  }

  return dominant;
}

/**
 * Rewrite one segment to the convention. Only kebab-case and snake_case rewrite anything.
 */
export function applyNamingConvention(segment: string, convention: NamingConvention): string {
  switch (convention) {
    case 'kebab-case':
      return segment.replace(/[_\s]+/g, '-').toLowerCase();
    case 'snake_case':
      return segment.replace(/[-\s]+/g, '_').toLowerCase();
    default:
      return segment;
  }
}
