/**
 * HTTP API request/response type definitions
 */
import type { PersonaInfo } from './persona';
import type { ConversationStats } from './conversation';

/**
 * Request body for POST /ingest
 */
export interface IngestRequest {
  url?: unknown;
  user_id?: unknown;
  guild_id?: unknown;
  persona_id?: unknown;
}

/**
 * Response body for POST /ingest
 */
export interface IngestResponse {
  summary: string;
  persona: PersonaInfo;
  article_title: string;
  article_url: string;
}

/**
 * Request body for POST /chat
 */
export interface ChatRequest {
  persona_id?: unknown;
  user_message?: unknown;
  user_id?: unknown;
  conversation_history?: unknown;
}

/**
 * Response body for POST /chat
 */
export interface ChatResponse {
  response: string;
  persona: PersonaInfo;
  context_used: number;
}

export interface HealthResponse {
  status: 'ok';
  version: string;
  personas: number;
  stats: ConversationStats;
}

/**
 * Error body returned by every route
 */
export interface ErrorResponse {
  detail: string;
  error_type: string;
}
