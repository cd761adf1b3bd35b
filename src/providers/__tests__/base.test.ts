import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { BaseAIProvider, classifyProviderStatus, mergeHeaders } from '../base';
import { UpstreamLLMError } from '../../errors';
import type { Message, AIProviderConfig, AIProviderResponse } from '../../types';
import { startStalledServer } from '../../__tests__/helpers';

class TestProvider extends BaseAIProvider {
  readonly name = 'Test Provider';

  async chat(messages: Message[]): Promise<AIProviderResponse> {
    const data = await this.makeRequest('/test', { messages });
    return this.parseResponse(data);
  }

  protected parseResponse(data: unknown): AIProviderResponse {
    if (typeof data === 'object' && data !== null && 'content' in data && typeof data.content === 'string') {
      return { content: data.content };
    }
    throw new UpstreamLLMError('ProviderError', 'bad body');
  }
}

async function captureError(promise: Promise<unknown>): Promise<UpstreamLLMError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof UpstreamLLMError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('BaseAIProvider', () => {
  let provider: TestProvider;
  let config: AIProviderConfig;
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    config = {
      apiKey: 'test-api-key',
      model: 'test-model',
      maxTokens: 100,
      temperature: 1,
      baseUrl: 'https://api.test.com',
      timeout: 5000,
      extraHeaders: { 'X-Title': 'Tests' },
    };
    provider = new TestProvider(config);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('isConfigured', () => {
    it('should return true when API key is present', () => {
      expect(provider.isConfigured).toBe(true);
    });

    it('should return false when API key is empty', () => {
      const emptyProvider = new TestProvider({ ...config, apiKey: '' });
      expect(emptyProvider.isConfigured).toBe(false);
    });
  });

  describe('makeRequest', () => {
    it('should make authenticated POST request with extra headers', async () => {
      fetchMock.mockResolvedValue(new Response(JSON.stringify({ content: 'response' })));

      const result = await provider['makeRequest']('/test', { test: 'data' });

      expect(result).toEqual({ content: 'response' });
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.test.com/test',
        expect.objectContaining({
          method: 'POST',
          body: JSON.stringify({ test: 'data' }),
          headers: {
            'Content-Type': 'application/json',
            Authorization: 'Bearer test-api-key',
            'X-Title': 'Tests',
          },
        })
      );
    });

    it('should omit the authorization header without a key', async () => {
      fetchMock.mockResolvedValue(new Response(JSON.stringify({ content: 'ok' })));
      const keyless = new TestProvider({ ...config, apiKey: '', extraHeaders: undefined });

      await keyless['makeRequest']('/test', {});

      const init = fetchMock.mock.calls[0][1];
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should map error statuses without leaking the body', async () => {
      fetchMock.mockResolvedValue(new Response('secret upstream detail', { status: 401 }));

      const error = await captureError(provider['makeRequest']('/test', {}));

      expect(error.reason).toBe('AuthError');
      expect(error.message).toBe('HTTP 401');
      expect(error.message).not.toContain('secret');
    });

    it('should report malformed JSON as a provider error', async () => {
      fetchMock.mockResolvedValue(new Response('not json', { status: 200 }));

      const error = await captureError(provider['makeRequest']('/test', {}));

      expect(error.reason).toBe('ProviderError');
      expect(error.message).toBe('Malformed response body');
    });

    it('should report timeouts', async () => {
      const abort = new Error('aborted');
      abort.name = 'AbortError';
      fetchMock.mockRejectedValue(abort);

      const error = await captureError(provider['makeRequest']('/test', {}));

      expect(error.reason).toBe('Timeout');
      expect(error.message).toBe('Request timeout after 5000ms');
    });

    it('should report network failures as provider errors', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const error = await captureError(provider['makeRequest']('/test', {}));

      expect(error.reason).toBe('ProviderError');
      expect(error.message).toBe('Provider request failed');
    });
  });

  describe('complete', () => {
    it('should prepend the system instruction and trim the result', async () => {
      fetchMock.mockResolvedValue(new Response(JSON.stringify({ content: '  hello  ' })));

      const text = await provider.complete('Be brief.', [{ role: 'user', content: 'hi' }]);

      expect(text).toBe('hello');
      const init = fetchMock.mock.calls[0][1];
      expect(JSON.parse(String(init?.body))).toEqual({
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'hi' },
        ],
      });
    });
  });
});

describe('classifyProviderStatus', () => {
  it.each([
    [401, 'AuthError'],
    [403, 'AuthError'],
    [429, 'RateLimited'],
    [408, 'Timeout'],
    [504, 'Timeout'],
    [500, 'ProviderError'],
    [400, 'ProviderError'],
  ])('should map %i to %s', (status, reason) => {
    expect(classifyProviderStatus(status)).toBe(reason);
  });
});

describe('mergeHeaders', () => {
  it('should let later sources replace headers of any casing', () => {
    expect(
      mergeHeaders(
        { 'HTTP-Referer': 'https://default.example', 'X-Title': 'Default' },
        undefined,
        { 'HTTP-REFERER': 'https://custom.example' }
      )
    ).toEqual({ 'X-Title': 'Default', 'HTTP-REFERER': 'https://custom.example' });
  });
});

describe('BaseAIProvider with a provider that stalls', () => {
  it('should time out while the completion body is still arriving', async () => {
    const server = await startStalledServer('application/json', '{"content":');
    const provider = new TestProvider({
      apiKey: 'test-api-key',
      model: 'test-model',
      maxTokens: 100,
      temperature: 1,
      baseUrl: server.url,
      timeout: 100,
    });
    try {
      const error = await captureError(provider.complete('Be brief.', []));
      expect(error.reason).toBe('Timeout');
      expect(error.message).toBe('Request timeout after 100ms');
    } finally {
      await server.close();
    }
  });
});
