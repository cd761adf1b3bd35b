/**
 * Application configuration - loads environment variables and provides type-safe config
 * Supports .env and key.env files (key.env overrides .env)
 */
import path from 'path';
import dotenv from 'dotenv';
import type { ProviderType } from '../types/index';

dotenv.config({ path: path.join(process.cwd(), '.env') });
dotenv.config({ path: path.join(process.cwd(), 'key.env'), override: true });

export const API_VERSION = '1.0.0';

type Env = Record<string, string | undefined>;

/**
 * Gets environment variable or returns default value
 */
function optionalEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Parses string to a positive integer, returns default if invalid
 */
function parseNumber(value: string, defaultValue: number): number {
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

function parseFloatValue(value: string, defaultValue: number): number {
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

const PROVIDER_TYPES: readonly ProviderType[] = [
  'openai',
  'qwen',
  'openrouter',
  'xai',
  'ollama',
  'custom',
];

/**
 * Validates and parses provider type from environment variable
 */
function parseProviderType(value: string): ProviderType {
  const normalized = value.toLowerCase();
  return PROVIDER_TYPES.find((type) => type === normalized) ?? 'qwen';
}

/**
 * Collects LLM_EXTRA_HEADER_<NAME>=value pairs; underscores in NAME become dashes
 */
function parseExtraHeaders(env: Env): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('LLM_EXTRA_HEADER_') || !value) continue;
    const headerName = key.slice('LLM_EXTRA_HEADER_'.length).replace(/_/g, '-');
    if (headerName) {
      headers[headerName] = value;
    }
  }
  return headers;
}

/**
 * Type-safe application configuration structure
 */
export interface AppConfig {
  server: {
    host: string;
    port: number;
    rateLimitCooldownMs: number;
  };
  discord: {
    token: string;
  };
  llm: {
    provider: ProviderType;
    apiKey: string;
    /** Empty means "use the provider preset" */
    apiUrl: string;
    model: string;
    maxTokens: number;
    temperature: number;
    timeout: number;
    extraHeaders: Record<string, string>;
  };
  conversation: {
    maxHistory: number;
    contextLimit: number;
  };
  rateLimit: {
    cooldownMs: number;
  };
  article: {
    maxChars: number;
    fetchTimeout: number;
    summaryMinLength: number;
    summaryMaxLength: number;
  };
  persona: {
    personasDir: string;
  };
  logging: {
    logLevel: string;
    timezone: string;
  };
}

/**
 * Builds the configuration from an environment record
 */
export function loadConfig(env: Env): AppConfig {
  const maxHistory = Math.max(1, parseNumber(optionalEnv(env, 'MAX_HISTORY', '20'), 20));
  const contextLimit = parseNumber(optionalEnv(env, 'CONTEXT_LIMIT', '10'), 10);

  return {
    server: {
      host: optionalEnv(env, 'API_HOST', '0.0.0.0'),
      port: parseNumber(optionalEnv(env, 'PORT', optionalEnv(env, 'API_PORT', '8000')), 8000),
      rateLimitCooldownMs:
        parseNumber(optionalEnv(env, 'API_RATE_LIMIT_COOLDOWN_SECONDS', '5'), 5) * 1000,
    },
    discord: {
      token: optionalEnv(env, 'DISCORD_TOKEN', ''),
    },
    llm: {
      provider: parseProviderType(optionalEnv(env, 'LLM_PROVIDER', 'qwen')),
      apiKey: optionalEnv(env, 'LLM_API_KEY', ''),
      apiUrl: optionalEnv(env, 'LLM_API_URL', ''),
      model: optionalEnv(env, 'LLM_MODEL', ''),
      maxTokens: parseNumber(optionalEnv(env, 'LLM_MAX_TOKENS', '500'), 500),
      temperature: parseFloatValue(optionalEnv(env, 'LLM_TEMPERATURE', '1.0'), 1.0),
      timeout: parseNumber(optionalEnv(env, 'LLM_TIMEOUT_MS', '30000'), 30000),
      extraHeaders: parseExtraHeaders(env),
    },
    conversation: {
      maxHistory,
      // The LLM context is always a suffix of what is retained
      contextLimit: Math.min(contextLimit, maxHistory),
    },
    rateLimit: {
      cooldownMs: parseNumber(optionalEnv(env, 'RATE_LIMIT_COOLDOWN_SECONDS', '60'), 60) * 1000,
    },
    article: {
      maxChars: parseNumber(optionalEnv(env, 'ARTICLE_MAX_CHARS', '2000'), 2000),
      fetchTimeout: parseNumber(optionalEnv(env, 'FETCH_TIMEOUT_MS', '15000'), 15000),
      summaryMinLength: parseNumber(optionalEnv(env, 'SUMMARY_MIN_LENGTH', '150'), 150),
      summaryMaxLength: parseNumber(optionalEnv(env, 'SUMMARY_MAX_LENGTH', '300'), 300),
    },
    persona: {
      personasDir: optionalEnv(env, 'PERSONAS_DIR', path.join(process.cwd(), 'personas')),
    },
    logging: {
      logLevel: optionalEnv(env, 'LOG_LEVEL', 'INFO'),
      timezone: optionalEnv(env, 'LOG_TIMEZONE', 'UTC'),
    },
  };
}

export const config: AppConfig = loadConfig(process.env);
