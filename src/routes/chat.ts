/**
 * Chat route handler - stateless persona chat for non-Discord clients
 *
 * The caller owns the conversation: history arrives with each request and
 * nothing is stored server-side.
 */
import { Router } from 'express';
import type {
  ChatResponse,
  CompletionService,
  ConversationMessage,
  PersonaInfo,
  PersonaSource,
} from '../types/index';
import { config } from '../config/index';
import { PersonaNotFoundError, ValidationError } from '../errors/index';
import { toPersonaInfo } from '../services/article-summary';
import { DEFAULT_CHAT_INSTRUCTION } from '../services/dispatcher';
import { LoggerService } from '../services/logger';
import { RateLimiterService } from '../services/rate-limiter';
import { isRecord } from '../utils/guards';
import {
  handleRouteError,
  optionalString,
  requireBody,
  sendRateLimited,
  type JsonRequest,
  type JsonResponse,
} from './errors';

export const DEFAULT_ASSISTANT_INFO: PersonaInfo = {
  name: 'Assistant',
  icon: '🤖',
  color: 0x5865f2,
  description: 'Default assistant voice',
};

export interface ParsedChatRequest {
  personaId: string | null;
  userMessage: string;
  userId?: string;
  history: ConversationMessage[];
}

function parseHistory(value: unknown): ConversationMessage[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError("Field 'conversation_history' must be an array", {
      field: 'conversation_history',
    });
  }

  return value.map((entry: unknown, index) => {
    const role: unknown = isRecord(entry) ? entry.role : undefined;
    const content: unknown = isRecord(entry) ? entry.content : undefined;
    if ((role !== 'user' && role !== 'assistant') || typeof content !== 'string') {
      throw new ValidationError(
        `conversation_history[${index}] must have role 'user' or 'assistant' and string content`,
        { field: 'conversation_history', index }
      );
    }
    return { role, content };
  });
}

/**
 * Validates a POST /chat body
 */
export function parseChatRequest(body: unknown): ParsedChatRequest {
  const fields = requireBody(body);
  const userMessage = optionalString(fields, 'user_message');
  if (!userMessage) {
    throw new ValidationError("Field 'user_message' is required", { field: 'user_message' });
  }

  return {
    personaId: optionalString(fields, 'persona_id')?.toLowerCase() ?? null,
    userMessage,
    userId: optionalString(fields, 'user_id'),
    history: parseHistory(fields.conversation_history),
  };
}

export interface ChatDeps {
  personas: PersonaSource;
  completion: CompletionService;
  rateLimiter: RateLimiterService;
  logger: LoggerService;
  contextLimit?: number;
}

export function createChatHandler(deps: ChatDeps) {
  const { personas, completion, rateLimiter, logger } = deps;
  const contextLimit = deps.contextLimit ?? config.conversation.contextLimit;

  return async (req: JsonRequest, res: JsonResponse): Promise<void> => {
    try {
      const request = parseChatRequest(req.body);

      const persona = request.personaId === null ? undefined : personas.getPersona(request.personaId);
      if (request.personaId !== null && !persona) {
        throw new PersonaNotFoundError(request.personaId, personas.listPersonaIds());
      }

      const clientKey = request.userId ?? req.ip ?? 'anonymous';
      if (!rateLimiter.tryAcquire(clientKey)) {
        sendRateLimited(res, rateLimiter.getRetryAfterMs(clientKey));
        return;
      }

      const history = contextLimit > 0 ? request.history.slice(-contextLimit) : [];
      const reply = await completion.complete(persona?.systemPrompt ?? DEFAULT_CHAT_INSTRUCTION, [
        ...history,
        { role: 'user', content: request.userMessage },
      ]);

      logger.info('Chat request answered', {
        personaId: persona?.id ?? null,
        contextUsed: history.length,
        responseLength: reply.length,
      });

      const body: ChatResponse = {
        response: reply,
        persona: persona ? toPersonaInfo(persona) : { ...DEFAULT_ASSISTANT_INFO },
        context_used: history.length,
      };
      res.status(200).json(body);
    } catch (error) {
      handleRouteError(res, error, logger, 'POST /chat');
    }
  };
}

/**
 * Creates Express router for POST /chat
 */
export function createChatRouter(deps: ChatDeps): Router {
  const router = Router();
  const handler = createChatHandler(deps);

  router.post('/', (req, res, next) => {
    handler(req, res).catch(next);
  });

  return router;
}
