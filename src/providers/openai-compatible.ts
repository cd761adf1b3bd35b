/**
 * OpenAI-compatible chat completions provider with service presets
 */
import { BaseAIProvider } from './base';
import type { Message, ProviderType } from '../types/index';
import type { AIProviderConfig, AIProviderResponse } from '../types/index';
import { UpstreamLLMError } from '../errors/index';
import { LoggerService } from '../services/logger';
import { isRecord } from '../utils/guards';

export interface ProviderPreset {
  label: string;
  baseUrl: string;
  model: string;
  requiresApiKey: boolean;
  headers?: Record<string, string>;
}

export const PROVIDER_PRESETS: Record<ProviderType, ProviderPreset> = {
  openai: {
    label: 'OpenAI',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    requiresApiKey: true,
  },
  qwen: {
    label: 'Qwen',
    baseUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
    model: 'qwen-plus',
    requiresApiKey: true,
  },
  openrouter: {
    label: 'OpenRouter',
    baseUrl: 'https://openrouter.ai/api/v1',
    model: 'openai/gpt-4o-mini',
    requiresApiKey: true,
    // OpenRouter attributes traffic with these
    headers: {
      'HTTP-Referer': 'https://github.com',
      'X-Title': 'Persona Link Bot',
    },
  },
  xai: {
    label: 'X.AI Grok',
    baseUrl: 'https://api.x.ai/v1',
    model: 'grok-2-latest',
    requiresApiKey: true,
  },
  ollama: {
    label: 'Ollama',
    baseUrl: 'http://localhost:11434/v1',
    model: 'llama3.1',
    requiresApiKey: false,
  },
  custom: {
    label: 'Custom',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    requiresApiKey: false,
  },
};

/**
 * Sampling parameters sent with every request
 */
const SAMPLING = {
  top_p: 0.9,
  frequency_penalty: 0.3,
  presence_penalty: 0.2,
} as const;

/**
 * Chat completions API response structure
 */
interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: unknown;
    };
  }>;
  usage?: {
    prompt_tokens?: unknown;
    completion_tokens?: unknown;
    total_tokens?: unknown;
  };
}

function toChatCompletionResponse(data: unknown): ChatCompletionResponse {
  if (!isRecord(data)) {
    return {};
  }
  const choices = Array.isArray(data.choices)
    ? data.choices.map((choice: unknown) => ({
        message:
          isRecord(choice) && isRecord(choice.message)
            ? { content: choice.message.content }
            : undefined,
      }))
    : undefined;
  const usage = isRecord(data.usage) ? data.usage : undefined;
  return { choices, usage };
}

/**
 * Talks to any service exposing POST /chat/completions
 */
export class OpenAICompatibleProvider extends BaseAIProvider {
  readonly name: string;
  private readonly requiresApiKey: boolean;
  private readonly temperature: number;

  constructor(
    config: AIProviderConfig,
    options: { name?: string; requiresApiKey?: boolean } = {},
    logger?: LoggerService
  ) {
    super(config, logger);
    this.name = options.name ?? 'OpenAI-compatible';
    this.requiresApiKey = options.requiresApiKey ?? true;
    this.temperature = config.temperature;
  }

  override get isConfigured(): boolean {
    return Boolean(this.config.baseUrl) && (!this.requiresApiKey || Boolean(this.config.apiKey));
  }

  async chat(messages: Message[]): Promise<AIProviderResponse> {
    const data = await this.makeRequest('/chat/completions', {
      model: this.config.model,
      messages,
      stream: false,
      max_tokens: this.config.maxTokens,
      temperature: this.temperature,
      ...SAMPLING,
    });

    return this.parseResponse(data);
  }

  protected parseResponse(data: unknown): AIProviderResponse {
    const parsed = toChatCompletionResponse(data);
    const content = parsed.choices?.[0]?.message?.content;
    if (typeof content !== 'string' || !content.trim()) {
      throw new UpstreamLLMError('ProviderError', 'Unable to parse AI response format', {
        provider: this.name,
      });
    }

    const usage = parsed.usage;
    return {
      content,
      usage:
        usage &&
        typeof usage.prompt_tokens === 'number' &&
        typeof usage.completion_tokens === 'number' &&
        typeof usage.total_tokens === 'number'
          ? {
              promptTokens: usage.prompt_tokens,
              completionTokens: usage.completion_tokens,
              totalTokens: usage.total_tokens,
            }
          : undefined,
    };
  }
}
