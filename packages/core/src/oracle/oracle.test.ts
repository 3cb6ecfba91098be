import { describe, it, expect, vi } from 'vitest';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { PromptContext } from '../resolver/prompt-context';
import { OracleCallError } from './errors';
import type { ChatClient, ChatCompletionOptions, OracleProvider } from './llm-client';
import { createOracle, LLMOracle } from './oracle';

const context: PromptContext = {
  rootName: 'Home',
  fileName: 'report.pdf',
  relativePath: 'inbox/report.pdf',
  hint: 'Type=Doc; Name=report.pdf; Parent=inbox; Ancestors=Home/inbox',
  taxonomy: '(no subfolders yet)',
  neighbors: 'ParentDir=inbox; SiblingDirs=; SiblingFiles=',
  projectType: 'general',
  namingConvention: 'unknown',
};

function fakeClient(provider: OracleProvider, reply: () => Promise<string>) {
  const chatCompletion = vi.fn(
    (_messages: ChatCompletionMessageParam[], _options?: ChatCompletionOptions): Promise<string> => reply()
  );
  const client: ChatClient = {
    getProvider: () => provider,
    getModel: () => 'test-model',
    chatCompletion,
  };
  return { client, chatCompletion };
}

describe('LLMOracle', () => {
  it('sends a provider-shaped suggestion prompt with the completion settings', async () => {
    const { client, chatCompletion } = fakeClient('openai', async () => 'Documents/Reports');
    const oracle = new LLMOracle(client);

    expect(await oracle.suggest(context)).toBe('Documents/Reports');

    const [messages, options] = chatCompletion.mock.calls[0];
    expect(messages[0]).toMatchObject({ role: 'system' });
    expect(messages[1].content).toContain('File: report.pdf');
    expect(options).toMatchObject({
      maxTokens: 50,
      temperature: 0.1,
      stop: ['\n\n', 'Path:', 'Folder:', 'Response:'],
    });
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('passes the candidate to the refinement prompt', async () => {
    const { client, chatCompletion } = fakeClient('ollama', async () => 'Home/Documents');
    const oracle = new LLMOracle(client);

    await oracle.refine(context, 'Home/Docs');

    const [messages] = chatCompletion.mock.calls[0];
    expect(messages).toHaveLength(1);
    expect(messages[0].content).toContain('Candidate: Home/Docs');
  });

  it('surfaces exhausted retries as OracleCallError', async () => {
    const { client, chatCompletion } = fakeClient('grok', async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const oracle = new LLMOracle(client, { maxRetries: 2, baseDelayMs: 1 });

    await expect(oracle.suggest(context)).rejects.toBeInstanceOf(OracleCallError);
    expect(chatCompletion).toHaveBeenCalledTimes(3);
  });
});

describe('createOracle', () => {
  it('builds an oracle for the detected provider', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const oracle = createOracle({ OPENAI_API_KEY: 'test-secret' });

    expect(oracle?.provider).toBe('openai');
    expect(log).toHaveBeenCalledWith('[Oracle] Using OpenAI (gpt-4o-mini)');
    log.mockRestore();
  });

  it('returns null when the chosen provider has no key', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(createOracle({ LLM_PROVIDER: 'grok' })).toBeNull();
    warn.mockRestore();
  });
});
