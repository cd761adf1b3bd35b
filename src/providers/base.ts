/**
 * Base class for AI providers - provides common functionality for HTTP requests with timeout
 */
import type { Message } from '../types/index';
import type { AIProvider, AIProviderConfig, AIProviderResponse } from '../types/index';
import { RequestTimeoutError, UpstreamLLMError } from '../errors/index';
import type { LLMFailureReason } from '../errors/index';
import { fetchWithTimeout } from '../utils/http';
import { LoggerService } from '../services/logger';

/**
 * Maps an HTTP status from a provider to a failure reason
 */
export function classifyProviderStatus(status: number): LLMFailureReason {
  if (status === 401 || status === 403) return 'AuthError';
  if (status === 429) return 'RateLimited';
  if (status === 408 || status === 504) return 'Timeout';
  return 'ProviderError';
}

/**
 * Merges header records; later sources win regardless of name casing
 */
export function mergeHeaders(...sources: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [name, value] of Object.entries(source)) {
      const existing = Object.keys(merged).find((key) => key.toLowerCase() === name.toLowerCase());
      if (existing !== undefined) {
        delete merged[existing];
      }
      merged[name] = value;
    }
  }
  return merged;
}

/**
 * Abstract base class for AI provider implementations
 * Handles HTTP requests, timeouts, and common provider logic
 */
export abstract class BaseAIProvider implements AIProvider {
  abstract readonly name: string;
  protected readonly config: AIProviderConfig;
  protected readonly logger: LoggerService | undefined;

  constructor(config: AIProviderConfig, logger?: LoggerService) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Checks if provider is properly configured (has API key)
   */
  get isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Request headers: JSON content type, bearer auth when a key is set, then extra headers
   */
  protected buildHeaders(): Record<string, string> {
    const base: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      base.Authorization = `Bearer ${this.config.apiKey}`;
    }
    return mergeHeaders(base, this.config.extraHeaders);
  }

  /**
   * Makes authenticated POST request to AI provider API.
   * Failures become UpstreamLLMError; bodies and keys are never put in the message.
   */
  protected async makeRequest(endpoint: string, body: unknown): Promise<unknown> {
    const url = `${this.config.baseUrl}${endpoint}`;

    try {
      return await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers: this.buildHeaders(),
          body: JSON.stringify(body),
        },
        this.config.timeout,
        (response) => this.readResponse(response)
      );
    } catch (error) {
      if (error instanceof UpstreamLLMError) {
        throw error;
      }
      if (error instanceof RequestTimeoutError) {
        throw new UpstreamLLMError('Timeout', error.message, { provider: this.name });
      }
      throw new UpstreamLLMError('ProviderError', 'Provider request failed', {
        provider: this.name,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async readResponse(response: Response): Promise<unknown> {
    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      this.logger?.debug('Provider error body', {
        provider: this.name,
        status: response.status,
        body: errorText.slice(0, 500),
      });
      throw new UpstreamLLMError(
        classifyProviderStatus(response.status),
        `HTTP ${response.status}`,
        { provider: this.name, status: response.status }
      );
    }

    const text = await response.text();
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch {
      throw new UpstreamLLMError('ProviderError', 'Malformed response body', {
        provider: this.name,
      });
    }
  }

  /**
   * Runs one completion with the instruction as system message
   * @returns Trimmed completion text
   */
  async complete(systemInstruction: string, messages: Message[]): Promise<string> {
    const response = await this.chat([{ role: 'system', content: systemInstruction }, ...messages]);
    if (response.usage) {
      this.logger?.debug('Completion usage', { provider: this.name, ...response.usage });
    }
    return response.content.trim();
  }

  /**
   * Sends chat messages to AI provider and returns response
   */
  abstract chat(messages: Message[]): Promise<AIProviderResponse>;

  /**
   * Parses provider-specific response format into standard format
   * @throws UpstreamLLMError if the body has no completion text
   */
  protected abstract parseResponse(data: unknown): AIProviderResponse;
}
