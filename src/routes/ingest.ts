/**
 * Ingest route handler - summarizes an article for non-Discord clients
 */
import { Router } from 'express';
import type { IngestResponse } from '../types/index';
import { ValidationError } from '../errors/index';
import type { ArticleSummarizer } from '../services/dispatcher';
import { LoggerService } from '../services/logger';
import { RateLimiterService } from '../services/rate-limiter';
import {
  handleRouteError,
  optionalString,
  requireBody,
  sendRateLimited,
  type JsonRequest,
  type JsonResponse,
} from './errors';

export interface ParsedIngestRequest {
  url: string;
  userId?: string;
  guildId?: string;
  personaId: string | null;
}

/**
 * Validates a POST /ingest body
 * @throws ValidationError when url is missing or a field has the wrong type
 */
export function parseIngestRequest(body: unknown): ParsedIngestRequest {
  const fields = requireBody(body);
  const url = optionalString(fields, 'url');
  if (!url) {
    throw new ValidationError("Field 'url' is required", { field: 'url' });
  }

  return {
    url,
    userId: optionalString(fields, 'user_id'),
    guildId: optionalString(fields, 'guild_id'),
    personaId: optionalString(fields, 'persona_id')?.toLowerCase() ?? null,
  };
}

export interface IngestDeps {
  summaries: ArticleSummarizer;
  rateLimiter: RateLimiterService;
  logger: LoggerService;
}

export function createIngestHandler(deps: IngestDeps) {
  const { summaries, rateLimiter, logger } = deps;

  return async (req: JsonRequest, res: JsonResponse): Promise<void> => {
    try {
      const request = parseIngestRequest(req.body);

      const clientKey = request.userId ?? req.ip ?? 'anonymous';
      if (!rateLimiter.tryAcquire(clientKey)) {
        const retryAfterMs = rateLimiter.getRetryAfterMs(clientKey);
        logger.info('Ingest request rate limited', { clientKey, retryAfterMs });
        sendRateLimited(res, retryAfterMs);
        return;
      }

      logger.info('Ingest request received', {
        url: request.url,
        userId: request.userId,
        guildId: request.guildId,
        personaId: request.personaId,
      });

      const result = await summaries.summarize(request.url, request.personaId);
      const body: IngestResponse = {
        summary: result.summary,
        persona: result.personaInfo,
        article_title: result.articleTitle,
        article_url: result.articleUrl,
      };
      res.status(200).json(body);
    } catch (error) {
      handleRouteError(res, error, logger, 'POST /ingest');
    }
  };
}

/**
 * Creates Express router for POST /ingest
 */
export function createIngestRouter(deps: IngestDeps): Router {
  const router = Router();
  const handler = createIngestHandler(deps);

  router.post('/', (req, res, next) => {
    handler(req, res).catch(next);
  });

  return router;
}
