/**
 * Express application factory - builds the services and mounts the HTTP routes
 */
import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import type { ArticleSource, CompletionService } from './types/index';
import { createChatRouter, createHealthRouter, createIngestRouter } from './routes/index';
import { handleRouteError, sendError } from './routes/errors';
import {
  ArticleFetcherService,
  ArticleSummaryService,
  ConversationService,
  Dispatcher,
  LoggerService,
  PersonaService,
  RateLimiterService,
} from './services/index';
import { createProvider } from './providers/index';
import { config } from './config/index';

/**
 * Container for all application services
 */
export interface AppServices {
  logger: LoggerService;
  store: ConversationService;
  personas: PersonaService;
  articles: ArticleSource;
  completion: CompletionService;
  summaries: ArticleSummaryService;
  dispatcher: Dispatcher;
  /** Cooldown for Discord slash commands */
  commandLimiter: RateLimiterService;
  /** Cooldown for HTTP API clients */
  apiLimiter: RateLimiterService;
}

/**
 * Collaborators that replace the default network-backed ones
 */
export interface AppOverrides {
  logger?: LoggerService;
  personas?: PersonaService;
  articles?: ArticleSource;
  completion?: CompletionService;
}

/**
 * Creates the services and the Express app.
 * Personas are not loaded here; call services.personas.loadAll() before serving.
 */
export function createApp(overrides: AppOverrides = {}): { app: Application; services: AppServices } {
  const logger = overrides.logger ?? new LoggerService();
  const store = new ConversationService(logger, { maxHistory: config.conversation.maxHistory });
  const personas = overrides.personas ?? new PersonaService(logger, config.persona.personasDir);
  const articles =
    overrides.articles ?? new ArticleFetcherService(logger, { timeout: config.article.fetchTimeout });
  const completion = overrides.completion ?? createProvider(logger);

  const summaries = new ArticleSummaryService(
    { articles, completion, personas, logger },
    {
      maxChars: config.article.maxChars,
      summaryMinLength: config.article.summaryMinLength,
      summaryMaxLength: config.article.summaryMaxLength,
    }
  );
  const commandLimiter = new RateLimiterService({ cooldownMs: config.rateLimit.cooldownMs });
  const apiLimiter = new RateLimiterService({ cooldownMs: config.server.rateLimitCooldownMs });

  const dispatcher = new Dispatcher(
    { store, personas, summaries, completion, rateLimiter: commandLimiter, logger },
    { contextLimit: config.conversation.contextLimit }
  );

  const app = express();
  app.use(express.json());

  app.use(createHealthRouter(personas, store));
  app.use('/ingest', createIngestRouter({ summaries, rateLimiter: apiLimiter, logger }));
  app.use(
    '/chat',
    createChatRouter({
      personas,
      completion,
      rateLimiter: apiLimiter,
      logger,
      contextLimit: config.conversation.contextLimit,
    })
  );

  // Malformed JSON bodies and anything a route did not handle
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, 400, 'ValidationError', 'Request body is not valid JSON');
      return;
    }
    handleRouteError(res, error, logger, `${req.method} ${req.path}`);
  });

  return {
    app,
    services: {
      logger,
      store,
      personas,
      articles,
      completion,
      summaries,
      dispatcher,
      commandLimiter,
      apiLimiter,
    },
  };
}
