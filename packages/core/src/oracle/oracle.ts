/**
 * Oracle
 *
 * The path-suggestion service. One implementation (LLMOracle) covers every backend; what differs
 * per provider is the prompt shape (formatPromptForProvider) and the timeout.
 *
 * Workflow Context:
 * - suggest(): First pass for a file
 * - refine(): Optional second pass with the first-pass path as candidate
 * - Both resolve to the raw response text; parsing happens in the resolver pipeline
 */
import {
  ORACLE_HOSTED_TIMEOUT_MS,
  ORACLE_LOCAL_TIMEOUT_MS,
  ORACLE_MAX_RETRIES,
  ORACLE_MAX_TOKENS,
  ORACLE_RETRY_BASE_DELAY_MS,
  ORACLE_STOP_SEQUENCES,
  ORACLE_TEMPERATURE,
} from '../constants';
import type { PromptContext } from '../resolver/prompt-context';
import { executeOracleCall } from './api-call-helper';
import type { ChatClient, OracleProvider } from './llm-client';
import { createLLMClient, getProviderDisplayName } from './llm-client';
import {
  buildRefinementRequest,
  buildSuggestionRequest,
  formatPromptForProvider,
} from './prompts/path-suggestion-prompt';

export type OracleRequestOptions = {
  /** Shared cancellation; stops new attempts but never aborts one in flight. */
  cancelSignal?: AbortSignal;
};

export interface Oracle {
  readonly provider: OracleProvider;
  suggest(context: PromptContext, options?: OracleRequestOptions): Promise<string>;
  refine(context: PromptContext, candidate: string, options?: OracleRequestOptions): Promise<string>;
}

export type LLMOracleOptions = {
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  maxTokens?: number;
  temperature?: number;
};

export class LLMOracle implements Oracle {
  readonly provider: OracleProvider;
  private timeoutMs: number;

  constructor(
    private client: ChatClient,
    private options: LLMOracleOptions = {}
  ) {
    this.provider = client.getProvider();
    this.timeoutMs =
      options.timeoutMs ?? (this.provider === 'ollama' ? ORACLE_LOCAL_TIMEOUT_MS : ORACLE_HOSTED_TIMEOUT_MS);
  }

  suggest(context: PromptContext, options?: OracleRequestOptions): Promise<string> {
    return this.ask(buildSuggestionRequest(context), context, `Suggest path for ${context.relativePath}`, options);
  }

  refine(context: PromptContext, candidate: string, options?: OracleRequestOptions): Promise<string> {
    return this.ask(
      buildRefinementRequest(context, candidate),
      context,
      `Refine "${candidate}" for ${context.relativePath}`,
      options
    );
  }

  private ask(
    baseRequest: string,
    context: PromptContext,
    reason: string,
    options?: OracleRequestOptions
  ): Promise<string> {
    const messages = formatPromptForProvider(this.provider, baseRequest, context);
    return executeOracleCall(
      (signal) =>
        this.client.chatCompletion(messages, {
          maxTokens: this.options.maxTokens ?? ORACLE_MAX_TOKENS,
          temperature: this.options.temperature ?? ORACLE_TEMPERATURE,
          stop: ORACLE_STOP_SEQUENCES,
          signal,
        }),
      {
        timeoutMs: this.timeoutMs,
        maxRetries: this.options.maxRetries ?? ORACLE_MAX_RETRIES,
        baseDelayMs: this.options.baseDelayMs ?? ORACLE_RETRY_BASE_DELAY_MS,
        reason,
        cancelSignal: options?.cancelSignal,
      }
    );
  }
}

/**
 * Oracle for the backend selected by the environment, or null when none is usable.
 */
export function createOracle(env: NodeJS.ProcessEnv = process.env, options?: LLMOracleOptions): LLMOracle | null {
  const client = createLLMClient(env);
  if (!client) {
    console.warn('[Oracle] No usable oracle backend configured');
    return null;
  }
  console.log(`[Oracle] Using ${getProviderDisplayName(client.getProvider())} (${client.getModel()})`);
  return new LLMOracle(client, options);
}
