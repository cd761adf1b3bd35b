/**
 * AI provider factory - creates provider instances based on configuration
 */
import type { AIProvider } from '../types/index';
import { OpenAICompatibleProvider, PROVIDER_PRESETS } from './openai-compatible';
import { LoggerService } from '../services/logger';
import { config as appConfig } from '../config/index';
import type { AppConfig } from '../config/index';
import { ConfigurationError } from '../errors/index';
import { mergeHeaders } from './base';

/**
 * Creates an AI provider from the LLM configuration.
 * Empty URL and model fall back to the provider preset.
 */
export function createProvider(
  logger?: LoggerService,
  llmConfig: AppConfig['llm'] = appConfig.llm
): AIProvider {
  const preset = PROVIDER_PRESETS[llmConfig.provider];

  return new OpenAICompatibleProvider(
    {
      apiKey: llmConfig.apiKey,
      model: llmConfig.model || preset.model,
      maxTokens: llmConfig.maxTokens,
      temperature: llmConfig.temperature,
      baseUrl: (llmConfig.apiUrl || preset.baseUrl).replace(/\/+$/, ''),
      timeout: llmConfig.timeout,
      extraHeaders: mergeHeaders(preset.headers, llmConfig.extraHeaders),
    },
    { name: preset.label, requiresApiKey: preset.requiresApiKey },
    logger
  );
}

/**
 * Gets a configured provider instance, throwing if not properly configured
 * @throws ConfigurationError if provider is missing required configuration (e.g., API key)
 */
export function getConfiguredProvider(
  logger?: LoggerService,
  llmConfig: AppConfig['llm'] = appConfig.llm
): AIProvider {
  const provider = createProvider(logger, llmConfig);
  if (!provider.isConfigured) {
    throw new ConfigurationError(`Provider ${provider.name} is not configured. Missing API key.`);
  }
  return provider;
}

export { OpenAICompatibleProvider, PROVIDER_PRESETS } from './openai-compatible';
export type { ProviderPreset } from './openai-compatible';
export { BaseAIProvider, classifyProviderStatus, mergeHeaders } from './base';
