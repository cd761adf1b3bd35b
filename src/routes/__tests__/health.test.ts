import { describe, it, expect } from 'vitest';
import { buildHealth, buildServiceInfo } from '../health';
import { ConversationService } from '../../services/conversation';
import { API_VERSION } from '../../config';
import { createPersonaSource, createSilentLogger, makePersona } from '../../__tests__/helpers';

describe('Health routes', () => {
  it('should describe the service', () => {
    expect(buildServiceInfo()).toEqual({
      service: 'persona-link-bot',
      version: API_VERSION,
      endpoints: ['GET /health', 'POST /ingest', 'POST /chat'],
    });
  });

  it('should report persona count and store stats', () => {
    const store = new ConversationService(createSilentLogger());
    store.setPersona('c1', 'sarcastic');
    store.appendExchange('c1', 'q', 'a');
    store.appendMessage('c2', 'user', 'hello');

    const health = buildHealth(createPersonaSource([makePersona('a'), makePersona('b')]), store);

    expect(health).toEqual({
      status: 'ok',
      version: API_VERSION,
      personas: 2,
      stats: { channelCount: 2, channelsWithPersona: 1, totalMessageCount: 3 },
    });
  });
});
