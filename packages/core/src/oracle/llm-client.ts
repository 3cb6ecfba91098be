import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

/**
 * Oracle backends. All three speak the OpenAI chat completions protocol:
 * Ollama through its local /v1 endpoint, xAI (Grok) through api.x.ai.
 */
export type OracleProvider = 'ollama' | 'openai' | 'grok';

export const ORACLE_PROVIDERS: readonly OracleProvider[] = ['ollama', 'openai', 'grok'];

export type LLMClientConfig = {
  provider: OracleProvider;
  apiKey?: string;
  model?: string;
  /** Overrides the provider's default endpoint (OLLAMA_HOST for local models). */
  baseURL?: string;
};

export const DEFAULT_MODELS: Record<OracleProvider, string> = {
  ollama: 'llama3.1',
  openai: 'gpt-4o-mini',
  grok: 'grok-2-mini',
};

const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
const XAI_BASE_URL = 'https://api.x.ai/v1';

function defaultBaseURL(provider: OracleProvider): string | undefined {
  switch (provider) {
    case 'ollama':
      return `${DEFAULT_OLLAMA_HOST}/v1`;
    case 'grok':
      return XAI_BASE_URL;
    case 'openai':
      return undefined;
  }
}

export type ChatCompletionOptions = {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  /** Aborts this single request (per-attempt timeout). */
  signal?: AbortSignal;
};

/**
 * The part of LLMClient the oracle depends on; tests substitute a fake.
 */
export interface ChatClient {
  getProvider(): OracleProvider;
  getModel(): string;
  chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string>;
}

export class LLMClient implements ChatClient {
  private client: OpenAI;
  private provider: OracleProvider;
  private readonly model: string;

  constructor(config: LLMClientConfig) {
    this.provider = config.provider;
    this.model = config.model ?? DEFAULT_MODELS[config.provider];

    // Retries and timeouts are owned by executeOracleCall
    this.client = new OpenAI({
      baseURL: config.baseURL ?? defaultBaseURL(config.provider),
      apiKey: config.apiKey ?? (config.provider === 'ollama' ? 'ollama' : undefined),
      maxRetries: 0,
    });
  }

  getProvider(): OracleProvider {
    return this.provider;
  }

  getModel(): string {
    return this.model;
  }

  async chatCompletion(
    messages: ChatCompletionMessageParam[],
    options?: ChatCompletionOptions
  ): Promise<string> {
    const modelToUse = options?.model ?? this.model;
    console.log(
      `[LLMClient] Making API call - Provider: ${this.provider}, Model: ${modelToUse}, Messages: ${messages.length}`
    );

    const response = await this.client.chat.completions.create(
      {
        model: modelToUse,
        messages,
        max_tokens: options?.maxTokens,
        temperature: options?.temperature,
        stop: options?.stop,
      },
      { signal: options?.signal }
    );

    if (!Array.isArray(response.choices) || response.choices.length === 0) {
      throw new Error(`API response has no choices (provider ${this.provider}, model ${modelToUse})`);
    }

    const content = response.choices[0]?.message?.content?.trim() ?? '';
    if (!content) {
      console.warn(
        `[LLMClient] Empty content in response. Finish reason: ${response.choices[0]?.finish_reason}, ` +
          `Model: ${modelToUse}, Provider: ${this.provider}`
      );
    }
    return content;
  }
}

function isOracleProvider(value: string): value is OracleProvider {
  return ORACLE_PROVIDERS.some((provider) => provider === value);
}

/**
 * Pick the oracle backend from the environment.
 *
 * Priority:
 * 1. LLM_PROVIDER - explicit choice (ollama | openai | grok)
 * 2. XAI_API_KEY - Grok
 * 3. OPENAI_API_KEY - OpenAI
 * 4. Local Ollama (OLLAMA_HOST, default http://localhost:11434)
 *
 * Returns null when the chosen hosted provider has no API key.
 */
export function detectOracleConfig(env: NodeJS.ProcessEnv = process.env): LLMClientConfig | null {
  const explicit = env.LLM_PROVIDER?.trim().toLowerCase();
  const xaiKey = env.XAI_API_KEY?.trim();
  const openaiKey = env.OPENAI_API_KEY?.trim();
  const model = env.LLM_MODEL?.trim() || undefined;
  const ollamaHost = env.OLLAMA_HOST?.trim().replace(/\/+$/, '');

  let provider: OracleProvider;
  if (explicit && isOracleProvider(explicit)) {
    provider = explicit;
  } else {
    if (explicit) {
      console.warn(`[LLMClient] Unknown LLM_PROVIDER "${explicit}", detecting from API keys`);
    }
    provider = xaiKey ? 'grok' : openaiKey ? 'openai' : 'ollama';
  }

  switch (provider) {
    case 'ollama':
      return {
        provider,
        model: model ?? DEFAULT_MODELS.ollama,
        baseURL: ollamaHost ? `${ollamaHost}/v1` : undefined,
      };
    case 'grok':
      if (!xaiKey) {
        console.warn('[LLMClient] LLM_PROVIDER=grok but XAI_API_KEY is not set');
        return null;
      }
      return { provider, apiKey: xaiKey, model: model ?? DEFAULT_MODELS.grok };
    case 'openai':
      if (!openaiKey) {
        console.warn('[LLMClient] LLM_PROVIDER=openai but OPENAI_API_KEY is not set');
        return null;
      }
      return { provider, apiKey: openaiKey, model: model ?? DEFAULT_MODELS.openai };
  }
}

/**
 * Create an LLM client from environment variables.
 * Returns null if the selected provider cannot be used.
 */
export function createLLMClient(env: NodeJS.ProcessEnv = process.env): LLMClient | null {
  const config = detectOracleConfig(env);
  if (!config) {
    return null;
  }
  return new LLMClient(config);
}

export function getProviderDisplayName(provider: OracleProvider): string {
  switch (provider) {
    case 'ollama':
      return 'Local (Ollama)';
    case 'openai':
      return 'OpenAI';
    case 'grok':
      return 'Grok';
  }
}
