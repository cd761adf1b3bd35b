import path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { createApp } from '../app';
import { config } from '../config';
import {
  ConversationService,
  Dispatcher,
  PersonaService,
  RateLimiterService,
} from '../services/index';
import type { ArticleSource, CompletionService } from '../types';
import { createSilentLogger } from './helpers';

function setup() {
  const logger = createSilentLogger();
  const fetchArticle = vi.fn<ArticleSource['fetchArticle']>().mockResolvedValue({
    url: 'https://example.com/article',
    title: 'Example',
    content: 'Body text.',
  });
  const complete = vi.fn<CompletionService['complete']>().mockResolvedValue('A short summary.');
  const personas = new PersonaService(logger, path.join(process.cwd(), 'personas'));
  const result = createApp({
    logger,
    personas,
    articles: { fetchArticle },
    completion: { complete },
  });
  return { ...result, fetchArticle, complete };
}

describe('createApp', () => {
  it('should create the app with fresh services', () => {
    const first = setup();
    const second = setup();

    expect(first.app).toBeDefined();
    expect(first.services.store).toBeInstanceOf(ConversationService);
    expect(first.services.dispatcher).toBeInstanceOf(Dispatcher);
    expect(first.services.commandLimiter).toBeInstanceOf(RateLimiterService);
    expect(first.services.store).not.toBe(second.services.store);
  });

  it('should give commands and API clients separate cooldowns', () => {
    const { services } = setup();

    expect(services.commandLimiter).not.toBe(services.apiLimiter);
    expect(services.commandLimiter.getCooldownMs()).toBe(config.rateLimit.cooldownMs);
    expect(services.apiLimiter.getCooldownMs()).toBe(config.server.rateLimitCooldownMs);
  });

  it('should wire the injected collaborators into the dispatcher', async () => {
    const { services, fetchArticle, complete } = setup();
    await services.personas.loadAll();

    const result = await services.dispatcher.dispatch({
      kind: 'message',
      channelId: 'c1',
      userId: 'u1',
      text: 'https://example.com/article',
      fromSelf: false,
      mentionsBot: false,
    });

    expect(fetchArticle).toHaveBeenCalledWith('https://example.com/article');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ type: 'summary', summary: { summary: 'A short summary.' } });
  });

  it('should switch to a bundled persona through the command path', async () => {
    const { services } = setup();
    await services.personas.loadAll();

    const result = await services.dispatcher.dispatch({
      kind: 'command',
      channelId: 'c1',
      userId: 'u1',
      name: 'persona',
      args: { style: 'professor' },
    });

    expect(result).toMatchObject({ type: 'persona-set', persona: { id: 'professor' } });
    expect(services.store.getPersona('c1')).toBe('professor');
  });
});
