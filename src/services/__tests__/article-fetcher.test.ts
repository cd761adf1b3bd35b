import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { ArticleFetcherService, extractArticle, ARTICLE_USER_AGENT } from '../article-fetcher';
import { UpstreamFetchError } from '../../errors';
import { createSilentLogger, startStalledServer } from '../../__tests__/helpers';

const ARTICLE_HTML = `<!doctype html>
<html>
  <head>
    <title>Page Title</title>
    <meta property="og:title" content="OG Title">
  </head>
  <body>
    <header><h1>Site name</h1></header>
    <nav><a href="/">Home</a></nav>
    <article>
      <h1>Headline</h1>
      <p>First
         paragraph.</p>
      <blockquote><p>Quoted</p></blockquote>
      <ul><li>Item one</li></ul>
      <script>var tracking = true;</script>
    </article>
    <footer><p>Footer text</p></footer>
  </body>
</html>`;

function htmlResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { 'content-type': 'text/html; charset=utf-8' },
  });
}

async function captureError(promise: Promise<unknown>): Promise<UpstreamFetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof UpstreamFetchError) return error;
    throw error;
  }
  throw new Error('Expected fetchArticle to fail');
}

describe('extractArticle', () => {
  it('should prefer og:title and read only the article body', () => {
    expect(extractArticle(ARTICLE_HTML, 'https://example.com/a')).toEqual({
      url: 'https://example.com/a',
      title: 'OG Title',
      content: 'Headline\nFirst paragraph.\nQuoted\nItem one',
    });
  });

  it('should fall back to <title> and then the first heading', () => {
    const withTitle = extractArticle('<title> Plain </title><p>Body</p>', 'u');
    expect(withTitle.title).toBe('Plain');

    const withHeading = extractArticle('<body><h1> Only  Heading </h1><p>Body</p></body>', 'u');
    expect(withHeading.title).toBe('Only Heading');
    expect(withHeading.content).toBe('Only Heading\nBody');
  });

  it('should return a null title when none is present', () => {
    expect(extractArticle('<p>Body</p>', 'u').title).toBeNull();
  });

  it('should use the main element when there is no article', () => {
    const html = '<body><p>Outside</p><main><p>Inside</p></main></body>';
    expect(extractArticle(html, 'u').content).toBe('Inside');
  });

  it('should fall back to plain text without block elements', () => {
    expect(extractArticle('<body><div>Plain   text</div></body>', 'u').content).toBe('Plain text');
  });
});

describe('ArticleFetcherService', () => {
  let fetchMock: Mock<typeof fetch>;
  let fetcher: ArticleFetcherService;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    fetcher = new ArticleFetcherService(createSilentLogger(), { timeout: 1000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should fetch and extract an article', async () => {
    fetchMock.mockResolvedValue(htmlResponse(ARTICLE_HTML));

    const article = await fetcher.fetchArticle('https://example.com/article');

    expect(article.title).toBe('OG Title');
    expect(article.content).toBe('Headline\nFirst paragraph.\nQuoted\nItem one');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com/article',
      expect.objectContaining({
        method: 'GET',
        redirect: 'follow',
        headers: expect.objectContaining({ 'User-Agent': ARTICLE_USER_AGENT }),
      })
    );
  });

  it('should reject non-http URLs without fetching', async () => {
    const error = await captureError(fetcher.fetchArticle('ftp://example.com/file'));
    expect(error.reason).toBe('InvalidUrl');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should reject unparsable URLs', async () => {
    const error = await captureError(fetcher.fetchArticle('not a url'));
    expect(error.reason).toBe('InvalidUrl');
  });

  it.each([
    [404, 'NotFound'],
    [410, 'NotFound'],
    [401, 'Forbidden'],
    [403, 'Forbidden'],
    [408, 'Timeout'],
    [500, 'HttpError'],
  ])('should map HTTP %i to %s', async (status, reason) => {
    fetchMock.mockResolvedValue(htmlResponse('', status));
    const error = await captureError(fetcher.fetchArticle('https://example.com/a'));
    expect(error.reason).toBe(reason);
    expect(error.message).toBe(`HTTP ${status}`);
  });

  it('should reject non-HTML content', async () => {
    fetchMock.mockResolvedValue(
      new Response('{}', { status: 200, headers: { 'content-type': 'application/json' } })
    );
    const error = await captureError(fetcher.fetchArticle('https://example.com/data.json'));
    expect(error.reason).toBe('UnsupportedContent');
  });

  it('should reject script-rendered pages with no text', async () => {
    fetchMock.mockResolvedValue(
      htmlResponse('<html><body><div id="app"></div><script>render()</script></body></html>')
    );
    const error = await captureError(fetcher.fetchArticle('https://example.com/app'));
    expect(error.reason).toBe('UnsupportedContent');
    expect(error.message).toBe('No extractable text');
  });

  it('should report aborted requests as timeouts', async () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    fetchMock.mockRejectedValue(abort);

    const error = await captureError(fetcher.fetchArticle('https://example.com/slow'));
    expect(error.reason).toBe('Timeout');
    expect(error.message).toBe('Request timeout after 1000ms');
  });

  it('should refuse pages that declare a size over the cap', async () => {
    fetcher = new ArticleFetcherService(createSilentLogger(), { timeout: 1000, maxBytes: 1024 });
    fetchMock.mockResolvedValue(
      new Response(ARTICLE_HTML, {
        status: 200,
        headers: { 'content-type': 'text/html', 'content-length': '4096' },
      })
    );

    const error = await captureError(fetcher.fetchArticle('https://example.com/huge'));
    expect(error.reason).toBe('TooLarge');
    expect(error.details).toEqual({
      url: 'https://example.com/huge',
      maxBytes: 1024,
      reason: 'TooLarge',
    });
  });

  it('should stop reading a body that grows past the cap', async () => {
    fetcher = new ArticleFetcherService(createSilentLogger(), { timeout: 1000, maxBytes: 64 });
    fetchMock.mockResolvedValue(htmlResponse(`<p>${'x'.repeat(200)}</p>`));

    const error = await captureError(fetcher.fetchArticle('https://example.com/long'));
    expect(error.reason).toBe('TooLarge');
    expect(error.message).toBe('Response body exceeds 64 bytes');
  });

  it('should report socket failures as network errors', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const error = await captureError(fetcher.fetchArticle('https://example.com/down'));
    expect(error.reason).toBe('NetworkError');
    expect(error.details).toEqual({
      url: 'https://example.com/down',
      cause: 'fetch failed',
      reason: 'NetworkError',
    });
  });
});

describe('ArticleFetcherService with a page that stalls', () => {
  it('should time out while the body is still arriving', async () => {
    const server = await startStalledServer('text/html', '<html><body><p>Partial');
    const fetcher = new ArticleFetcherService(createSilentLogger(), { timeout: 100 });
    try {
      const error = await captureError(fetcher.fetchArticle(`${server.url}/article`));
      expect(error.reason).toBe('Timeout');
      expect(error.message).toBe('Request timeout after 100ms');
    } finally {
      await server.close();
    }
  });
});
