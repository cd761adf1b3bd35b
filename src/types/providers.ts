/**
 * AI provider type definitions and interfaces
 */
import type { Message } from './conversation';

/**
 * Configuration required for AI provider initialization
 */
export interface AIProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  baseUrl: string;
  timeout: number;
  extraHeaders?: Record<string, string>;
}

/**
 * Standardized response format from AI providers
 */
export interface AIProviderResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * Capability consumed by the dispatcher: one completion per call
 */
export interface CompletionService {
  complete(systemInstruction: string, messages: Message[]): Promise<string>;
}

/**
 * Interface that all AI providers must implement
 */
export interface AIProvider extends CompletionService {
  readonly name: string;
  readonly isConfigured: boolean;
  chat(messages: Message[]): Promise<AIProviderResponse>;
}

/**
 * Supported AI provider presets
 */
export type ProviderType = 'openai' | 'qwen' | 'openrouter' | 'xai' | 'ollama' | 'custom';
