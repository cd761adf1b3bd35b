/**
 * Shared request/response shapes and error mapping for the HTTP routes
 */
import type { ErrorResponse } from '../types/index';
import {
  PersonaNotFoundError,
  UpstreamFetchError,
  UpstreamLLMError,
  ValidationError,
} from '../errors/index';
import { fetchFailureMessage, LLM_FAILURE_MESSAGE } from '../services/dispatcher';
import { LoggerService } from '../services/logger';
import { isRecord } from '../utils/guards';

/**
 * The parts of an Express request the handlers read
 */
export interface JsonRequest {
  body?: unknown;
  ip?: string;
}

/**
 * The parts of an Express response the handlers write
 */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export function sendError(
  res: JsonResponse,
  status: number,
  errorType: string,
  detail: string
): void {
  const body: ErrorResponse = { detail, error_type: errorType };
  res.status(status).json(body);
}

export function sendRateLimited(res: JsonResponse, retryAfterMs: number): void {
  const seconds = Math.ceil(retryAfterMs / 1000);
  sendError(res, 429, 'RateLimited', `Too many requests. Try again in ${seconds}s.`);
}

/**
 * Maps a failure from a route to its status code and error body
 */
export function handleRouteError(
  res: JsonResponse,
  error: unknown,
  logger: LoggerService,
  route: string
): void {
  if (error instanceof PersonaNotFoundError) {
    sendError(
      res,
      404,
      error.name,
      `Persona '${error.personaId}' not found. Available personas: ${error.validIds.join(', ')}`
    );
    return;
  }

  if (error instanceof ValidationError) {
    sendError(res, 400, error.name, error.message);
    return;
  }

  if (error instanceof UpstreamFetchError) {
    logger.warn('Article fetch failed', { route, error });
    sendError(res, 400, error.reason, fetchFailureMessage(error.reason));
    return;
  }

  if (error instanceof UpstreamLLMError) {
    logger.warn('Completion failed', { route, error });
    sendError(res, 500, error.reason, LLM_FAILURE_MESSAGE);
    return;
  }

  logger.error(`Unexpected error in ${route}`, error);
  sendError(res, 500, 'InternalError', 'Internal server error');
}

/**
 * Reads an optional string field; empty strings count as absent
 */
export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`Field '${field}' must be a string`, { field });
  }
  return value.trim() || undefined;
}

export function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}
