/**
 * LLM Service
 *
 * Thin client over hosted and local text-generation backends with a
 * per-request timeout, token accounting and JSON extraction. Callers get
 * the first failure; nothing here retries.
 */

import logger from '../../utils/logger.js';
import { isRecord, numberField, stringField, type JsonRecord } from '../../utils/json-fields.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Completion request parameters
 */
export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
  responseFormat?: 'text' | 'json';
}

/**
 * Completion response
 */
export interface CompletionResponse {
  content: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  name: string;
  generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
  countTokens(text: string): number;
  maxContextTokens: number;
  maxOutputTokens: number;
}

/**
 * Token usage tracking
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  requests: number;
}

export type ProviderKind = 'anthropic' | 'openai' | 'local';

/**
 * LLM service options
 */
export interface LLMServiceOptions {
  /** Request timeout in ms */
  timeout?: number;
}

/**
 * Options for createLLMService. Credentials are passed in, never read from the environment.
 */
export interface CreateLLMServiceOptions extends LLMServiceOptions {
  provider: ProviderKind;
  apiKey?: string | null;
  model?: string | null;
  /** Custom API base URL (OpenAI-compatible proxy, enterprise gateway, local server) */
  apiBase?: string | null;
}

export const DEFAULT_MODELS: Record<ProviderKind, string> = {
  anthropic: 'claude-3-haiku-20240307',
  openai: 'gpt-4o-mini',
  local: 'llama3',
};

export const DEFAULT_LOCAL_BASE_URL = 'http://localhost:11434/v1';
const DEFAULT_TIMEOUT_MS = 60000;

/**
 * Error returned by a provider's HTTP API
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public status: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

// ============================================================================
// FETCH HELPERS
// ============================================================================

/**
 * Validate and normalise an API base URL.
 * Returns the cleaned URL or throws on invalid input.
 */
export function normalizeApiBase(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid API base URL: "${url}". Must be a valid URL (e.g., http://localhost:11434/v1).`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported protocol in API base URL: "${parsed.protocol}". Only http and https are allowed.`);
  }

  return parsed.toString().replace(/\/+$/, '');
}

async function postJSON(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal
): Promise<JsonRecord> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw new ProviderError(await response.text(), response.status);
  }

  const data: unknown = await response.json();
  if (!isRecord(data)) {
    throw new ProviderError('Unexpected response body', response.status);
  }
  return data;
}

// ============================================================================
// TOKEN ESTIMATION
// ============================================================================

/**
 * Estimate token count from text (rough approximation)
 * ~4 characters per token for English text
 */
export function estimateTokens(text: string): number {
  // Punctuation-heavy code tokenises at roughly 2 characters per token
  const codePatterns = /[{}()[\];:,.<>/\\|`~!@#$%^&*=+]/g;
  const codeCharCount = (text.match(codePatterns) ?? []).length;
  const regularCharCount = text.length - codeCharCount;

  return Math.ceil(regularCharCount / 4 + codeCharCount / 2);
}

// ============================================================================
// ANTHROPIC PROVIDER
// ============================================================================

/**
 * Anthropic Claude provider
 */
export class AnthropicProvider implements LLMProvider {
  name = 'anthropic';
  maxContextTokens = 200000;
  maxOutputTokens = 4096;

  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(apiKey: string, model = DEFAULT_MODELS.anthropic, baseUrl?: string) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl ? normalizeApiBase(baseUrl) : 'https://api.anthropic.com/v1';
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const data = await postJSON(
      `${this.baseUrl}/messages`,
      {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      {
        model: this.model,
        max_tokens: request.maxTokens ?? this.maxOutputTokens,
        temperature: request.temperature ?? 0.3,
        system: request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
        stop_sequences: request.stopSequences,
      },
      signal
    );

    const blocks: JsonRecord[] = Array.isArray(data.content) ? data.content.filter(isRecord) : [];
    const content = blocks
      .filter((block) => block.type === 'text')
      .map((block) => stringField(block, 'text'))
      .join('');

    const usage: JsonRecord = isRecord(data.usage) ? data.usage : {};
    const inputTokens = numberField(usage, 'input_tokens');
    const outputTokens = numberField(usage, 'output_tokens');
    const stopReason = stringField(data, 'stop_reason');

    return {
      content,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      model: stringField(data, 'model', this.model),
      finishReason: stopReason === 'end_turn' ? 'stop' : stopReason === 'max_tokens' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// OPENAI-COMPATIBLE PROVIDER
// ============================================================================

export interface OpenAIProviderOptions {
  /** Reported provider name; "local" for self-hosted servers */
  name?: string;
  maxContextTokens?: number;
}

/**
 * OpenAI chat completions provider. Also drives OpenAI-compatible local
 * servers such as Ollama, which need no API key.
 */
export class OpenAIProvider implements LLMProvider {
  name: string;
  maxContextTokens: number;
  maxOutputTokens = 4096;

  private apiKey: string | null;
  private model: string;
  private baseUrl: string;

  constructor(apiKey: string | null, model = DEFAULT_MODELS.openai, baseUrl?: string, options: OpenAIProviderOptions = {}) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl ? normalizeApiBase(baseUrl) : 'https://api.openai.com/v1';
    this.name = options.name ?? 'openai';
    this.maxContextTokens = options.maxContextTokens ?? 128000;
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      max_tokens: request.maxTokens ?? this.maxOutputTokens,
      temperature: request.temperature ?? 0.3,
      stop: request.stopSequences,
    };

    if (request.responseFormat === 'json') {
      body.response_format = { type: 'json_object' };
    }

    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const data = await postJSON(`${this.baseUrl}/chat/completions`, headers, body, signal);

    const choices: JsonRecord[] = Array.isArray(data.choices) ? data.choices.filter(isRecord) : [];
    const first: JsonRecord = choices[0] ?? {};
    const message: JsonRecord = isRecord(first.message) ? first.message : {};
    const finishReason = stringField(first, 'finish_reason');
    const usage: JsonRecord = isRecord(data.usage) ? data.usage : {};
    const inputTokens = numberField(usage, 'prompt_tokens');
    const outputTokens = numberField(usage, 'completion_tokens');

    return {
      content: stringField(message, 'content'),
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: numberField(usage, 'total_tokens', inputTokens + outputTokens),
      },
      model: stringField(data, 'model', this.model),
      finishReason: finishReason === 'stop' ? 'stop' : finishReason === 'length' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// MOCK PROVIDER (for testing)
// ============================================================================

/**
 * Mock provider for testing
 */
export class MockLLMProvider implements LLMProvider {
  name = 'mock';
  maxContextTokens = 100000;
  maxOutputTokens = 4096;

  private responses: Map<string, string> = new Map();
  private defaultResponse = '{"result": "mock response"}';
  public callHistory: CompletionRequest[] = [];
  public shouldFail = false;
  public failCount = 0;
  /** Milliseconds to wait before answering; honours abort signals */
  public delayMs = 0;
  private currentFailCount = 0;

  setResponse(promptContains: string, response: string): void {
    this.responses.set(promptContains, response);
  }

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async generateCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    this.callHistory.push(request);

    if (this.delayMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, this.delayMs);
        signal?.addEventListener('abort', () => {
          clearTimeout(timer);
          reject(new Error('aborted'));
        });
      });
    }

    if (this.shouldFail && this.currentFailCount < this.failCount) {
      this.currentFailCount++;
      throw new ProviderError('Mock failure', 500);
    }

    let content = this.defaultResponse;
    for (const [key, value] of this.responses) {
      if (request.userPrompt.includes(key) || request.systemPrompt.includes(key)) {
        content = value;
        break;
      }
    }

    const inputTokens = this.countTokens(request.systemPrompt + request.userPrompt);
    const outputTokens = this.countTokens(content);

    return {
      content,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      model: 'mock-model',
      finishReason: 'stop',
    };
  }

  reset(): void {
    this.callHistory = [];
    this.shouldFail = false;
    this.failCount = 0;
    this.currentFailCount = 0;
    this.delayMs = 0;
    this.responses.clear();
  }
}

// ============================================================================
// JSON EXTRACTION
// ============================================================================

/**
 * Pull the JSON text out of a model reply: a fenced block if present,
 * otherwise the outermost braces, otherwise the trimmed reply.
 */
export function extractJSON(content: string): string {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    return fenced[1].trim();
  }

  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return content.slice(start, end + 1);
  }

  return content.trim();
}

// ============================================================================
// LLM SERVICE
// ============================================================================

/**
 * LLM Service - main interface for LLM interactions
 */
export class LLMService {
  private provider: LLMProvider;
  private timeout: number;
  private tokenUsage: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0, requests: 0 };

  constructor(provider: LLMProvider, options: LLMServiceOptions = {}) {
    this.provider = provider;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Get the provider name
   */
  getProviderName(): string {
    return this.provider.name;
  }

  /**
   * Get maximum context tokens for the provider
   */
  getMaxContextTokens(): number {
    return this.provider.maxContextTokens;
  }

  /**
   * Count tokens in text
   */
  countTokens(text: string): number {
    return this.provider.countTokens(text);
  }

  /**
   * Get current token usage
   */
  getTokenUsage(): TokenUsage {
    return { ...this.tokenUsage };
  }

  /**
   * Reset usage tracking
   */
  resetTracking(): void {
    this.tokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0, requests: 0 };
  }

  /**
   * Generate a completion
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const inputTokens = this.countTokens(request.systemPrompt + request.userPrompt);
    const maxTokens = request.maxTokens ?? this.provider.maxOutputTokens;
    const totalExpected = inputTokens + maxTokens;

    if (totalExpected > this.provider.maxContextTokens) {
      throw new Error(`Request exceeds context limit: ${totalExpected} > ${this.provider.maxContextTokens}`);
    }

    if (totalExpected > this.provider.maxContextTokens * 0.9) {
      logger.warning(`Approaching context limit: ${totalExpected} tokens (max: ${this.provider.maxContextTokens})`);
    }

    logger.debug(`LLM request to ${this.provider.name} (~${inputTokens} input tokens)`);
    const response = await this.executeWithTimeout(request);
    this.updateTracking(response);
    return response;
  }

  /**
   * Generate a completion expecting JSON; resolves to the parsed, unvalidated value
   */
  async completeJSON(request: CompletionRequest): Promise<unknown> {
    const jsonRequest: CompletionRequest = { ...request, responseFormat: 'json' };

    if (!jsonRequest.systemPrompt.toLowerCase().includes('json')) {
      jsonRequest.systemPrompt += '\n\nRespond with valid JSON only.';
    }

    const response = await this.complete(jsonRequest);
    return JSON.parse(extractJSON(response.content));
  }

  /**
   * Execute request, aborting it after the configured timeout
   */
  private async executeWithTimeout(request: CompletionRequest): Promise<CompletionResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.provider.generateCompletion(request, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`LLM request timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private updateTracking(response: CompletionResponse): void {
    this.tokenUsage.inputTokens += response.usage.inputTokens;
    this.tokenUsage.outputTokens += response.usage.outputTokens;
    this.tokenUsage.totalTokens += response.usage.totalTokens;
    this.tokenUsage.requests++;
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Create an LLM service for the given provider and explicit credentials
 */
export function createLLMService(options: CreateLLMServiceOptions): LLMService {
  const model = options.model ?? DEFAULT_MODELS[options.provider];
  const apiBase = options.apiBase ?? undefined;
  let provider: LLMProvider;

  switch (options.provider) {
    case 'anthropic':
      if (!options.apiKey) {
        throw new Error('An Anthropic API key is required');
      }
      provider = new AnthropicProvider(options.apiKey, model, apiBase);
      break;
    case 'openai':
      if (!options.apiKey) {
        throw new Error('An OpenAI API key is required');
      }
      provider = new OpenAIProvider(options.apiKey, model, apiBase);
      break;
    case 'local':
      provider = new OpenAIProvider(options.apiKey ?? null, model, apiBase ?? DEFAULT_LOCAL_BASE_URL, {
        name: 'local',
        maxContextTokens: 32768,
      });
      break;
  }

  return new LLMService(provider, { timeout: options.timeout });
}

/**
 * Create an LLM service with a mock provider (for testing)
 */
export function createMockLLMService(options: LLMServiceOptions = {}): { service: LLMService; provider: MockLLMProvider } {
  const provider = new MockLLMProvider();
  const service = new LLMService(provider, options);
  return { service, provider };
}
