export { RateLimiterService } from './rate-limiter';
export { LoggerService } from './logger';
export { ConversationService } from './conversation';
export { PersonaService } from './persona';
export { ArticleFetcherService } from './article-fetcher';
export { ArticleSummaryService } from './article-summary';
export { Dispatcher } from './dispatcher';
