/**
 * LLM Client Adapter
 *
 * Sends one rendered prompt to a provider and returns the raw text. No retries
 * happen here: the SDK's own retries are disabled so that the orchestrator's
 * single retry budget governs transport and validation failures alike.
 */

import OpenAI from 'openai';
import type { Config } from '../config';
import {
  ConfigurationError,
  FatalProviderError,
  TransientProviderError,
  errorMessage,
  isError,
} from '../errors';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';

export interface GenerationParams {
  temperature?: number;
  maxTokens?: number;
}

export interface LlmRequest {
  /** System prompt; omitted from the request when empty */
  system?: string;
  prompt: string;
  params?: GenerationParams;
}

export interface LlmClient {
  readonly provider: string;
  readonly model: string;

  /**
   * @throws TransientProviderError for failures worth retrying
   * @throws FatalProviderError when the provider rejects the request
   */
  complete(request: LlmRequest): Promise<string>;
}

/**
 * The slice of the OpenAI SDK this adapter needs. `new OpenAI().chat.completions`
 * satisfies it; tests pass a stub.
 */
export interface ChatCompletionsApi {
  create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { timeout?: number }
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Map any provider-side error onto the transient/fatal taxonomy.
 *
 * Transient: connection failures, timeouts, 408, 409, 429, 5xx, low-level
 * socket errors. Fatal: every other 4xx and anything unrecognised.
 */
export function classifyProviderError(error: unknown): TransientProviderError | FatalProviderError {
  if (error instanceof TransientProviderError || error instanceof FatalProviderError) {
    return error;
  }

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TransientProviderError(`Request timed out: ${error.message}`, 'timeout', { cause: error });
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new TransientProviderError(`Connection error: ${error.message}`, 'network', { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;

    if (status === undefined) {
      return new TransientProviderError(error.message, 'network', { cause: error });
    }
    if (status === 429) {
      return new TransientProviderError(`Rate limited: ${error.message}`, 'rate-limit', { cause: error });
    }
    if (status === 408) {
      return new TransientProviderError(`Request timed out: ${error.message}`, 'timeout', { cause: error });
    }
    if (status === 409 || status >= 500) {
      return new TransientProviderError(`Provider error ${status}: ${error.message}`, 'server', { cause: error });
    }
    return new FatalProviderError(`Provider rejected request (${status}): ${error.message}`, status, { cause: error });
  }

  if (isError(error)) {
    const code = errorCode(error);
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return new TransientProviderError(`Network error ${code}: ${error.message}`, 'network', { cause: error });
    }
  }

  return new FatalProviderError(`Unexpected provider error: ${errorMessage(error)}`, undefined, { cause: error });
}

export interface OpenAiClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseURL?: string;
}

/**
 * OpenAI chat completions adapter
 */
export class OpenAiLlmClient implements LlmClient {
  readonly provider = 'openai';
  readonly model: string;

  private readonly completions: ChatCompletionsApi;
  private readonly timeoutMs: number;

  constructor(options: OpenAiClientOptions, completions?: ChatCompletionsApi) {
    if (!options.apiKey) {
      throw new ConfigurationError(
        'OpenAI API key not provided. Set OPENAI_API_KEY or choose LLM_PROVIDER=mock.',
        { provider: 'openai' }
      );
    }

    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.completions =
      completions ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        maxRetries: 0, // retries belong to the extraction orchestrator
      }).chat.completions;
  }

  async complete(request: LlmRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    const startTime = Date.now();

    try {
      const response = await this.completions.create(
        {
          model: this.model,
          messages,
          temperature: request.params?.temperature,
          max_tokens: request.params?.maxTokens,
        },
        { timeout: this.timeoutMs }
      );

      const durationMs = Date.now() - startTime;
      llmRequestDurationHistogram.observe({ model: this.model }, durationMs / 1000);

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new TransientProviderError('Empty response from OpenAI', 'empty-response');
      }

      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      logger.debug('LLM request complete', {
        model: this.model,
        request_id: response.id,
        duration_ms: durationMs,
        tokens_used: response.usage?.total_tokens,
      });

      return content;
    } catch (error) {
      const classified = classifyProviderError(error);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });

      logger.warn('LLM request failed', {
        model: this.model,
        duration_ms: Date.now() - startTime,
        error_type: classified.name,
        error: classified.message,
      });

      throw classified;
    }
  }
}

export type ScriptEntry = string | Error | ((request: LlmRequest) => string | Promise<string>);

/**
 * Replays a fixed script of responses. Errors in the script are thrown,
 * functions are called with the request. Once the script is used up the last
 * entry repeats.
 */
export class ScriptedLlmClient implements LlmClient {
  readonly provider = 'mock';
  readonly requests: LlmRequest[] = [];

  private cursor = 0;

  constructor(
    private readonly script: readonly ScriptEntry[],
    readonly model = 'scripted'
  ) {
    if (script.length === 0) {
      throw new ConfigurationError('ScriptedLlmClient needs at least one scripted response');
    }
  }

  get callCount(): number {
    return this.requests.length;
  }

  async complete(request: LlmRequest): Promise<string> {
    this.requests.push(request);
    const entry = this.script[Math.min(this.cursor, this.script.length - 1)];
    this.cursor++;

    if (entry instanceof Error) throw entry;
    if (typeof entry === 'function') return entry(request);
    return entry;
  }
}

/**
 * Canned answer for the `mock` provider, for offline runs without credentials.
 */
export const MOCK_RESPONSE = `\`\`\`json
{
  "title": "Mock Document",
  "summary": "This is a mock summary generated because no LLM provider is configured.",
  "author_style": "N/A (mock provider)",
  "tone": "Neutral",
  "language": "English",
  "domain": "Testing",
  "estimated_date": null,
  "rarity": "🟢 Common",
  "author_profile": {
    "name": "Mock Author",
    "profession": "Test Writer",
    "writing_style": "Automated",
    "possible_age_range": "N/A",
    "location_guess": "Virtual Environment"
  }
}
\`\`\``;

/**
 * Create the LLM client selected by configuration.
 *
 * @throws ConfigurationError when the selected provider lacks credentials
 */
export function createLlmClient(config: Config): LlmClient {
  if (config.llmProvider === 'mock') {
    logger.warn('Using mock LLM provider - results are simulated');
    return new ScriptedLlmClient([MOCK_RESPONSE], 'mock');
  }

  return new OpenAiLlmClient({
    apiKey: config.openaiApiKey,
    model: config.llmModel,
    timeoutMs: config.llmRequestTimeoutMs,
    baseURL: config.openaiBaseUrl,
  });
}
