import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { PromptContext } from '../../resolver/prompt-context';
import type { OracleProvider } from '../llm-client';

/**
 * First pass: ask for a destination folder given the file and a sample of the existing tree.
 */
export const buildSuggestionRequest = (context: PromptContext): string => {
  return [
    'Return ONLY a relative folder path (1-3 levels) to organize the file.',
    'Prefer EXISTING folders from the taxonomy below. If a close synonym exists, use the existing folder name (do not invent new top-level names).',
    `Root: ${context.rootName}`,
    '',
    `Existing taxonomy (samples):\n${context.taxonomy}`,
    '',
    `File: ${context.fileName}`,
    context.hint,
    '',
    `Neighbor context:\n${context.neighbors}`,
    '',
    'Rules:',
    '- Output ONLY the path on one line',
    '- Use forward slashes',
    '- Max depth 3',
    "- If uncertain, reply 'Uncategorized'",
  ].join('\n');
};

/**
 * Second pass: give the oracle its own candidate back and let it fix taxonomy conflicts.
 */
export const buildRefinementRequest = (context: PromptContext, candidate: string): string => {
  return [
    'Given a candidate folder path, improve it ONLY if it conflicts with the existing taxonomy; otherwise return it unchanged.',
    'Output ONLY the path. Max depth 3. Prefer existing folder names from the taxonomy.',
    `Root: ${context.rootName}`,
    '',
    `Existing taxonomy (samples):\n${context.taxonomy}`,
    '',
    `Filename: ${context.fileName}`,
    context.hint,
    `Candidate: ${candidate}`,
  ].join('\n');
};

const OPENAI_SYSTEM_PROMPT =
  'You are a file organization expert. Respond only with folder paths for organizing files.';

const GROK_SYSTEM_PROMPT =
  'You are a file organization assistant. Provide only folder paths for file organization.';

/**
 * Shape a base request for one backend. Local models get a short direct prompt;
 * hosted models get a system message and an explicit rules block.
 */
export function formatPromptForProvider(
  provider: OracleProvider,
  baseRequest: string,
  context: Pick<PromptContext, 'projectType'>
): ChatCompletionMessageParam[] {
  switch (provider) {
    case 'ollama': {
      let prompt = `${baseRequest}\n\nRespond with only the folder path:`;
      if (context.projectType !== 'general') {
        prompt += `\n\nProject type: ${context.projectType}`;
      }
      return [{ role: 'user', content: prompt }];
    }
    case 'openai': {
      let prompt = [
        'As a file organization expert, determine the best folder structure for this file.',
        '',
        baseRequest,
        '',
        'Rules:',
        '- Respond with ONLY the folder path',
        '- Use forward slashes (/)',
        '- Be specific but concise',
        '- If uncertain, use "Uncategorized"',
        '',
        'Folder path:',
      ].join('\n');
      if (context.projectType !== 'general') {
        prompt += `\n\nProject context: ${context.projectType}`;
      }
      return [
        { role: 'system', content: OPENAI_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ];
    }
    case 'grok': {
      let prompt = [
        'File organization task:',
        '',
        baseRequest,
        '',
        'Important: Respond with ONLY the folder path where this file should go. Nothing else.',
        '',
        'Folder path:',
      ].join('\n');
      if (context.projectType !== 'general') {
        prompt += `\n\nProject type: ${context.projectType}`;
      }
      return [
        { role: 'system', content: GROK_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ];
    }
  }
}
