/**
 * Article fetcher - downloads a page and extracts its main text
 */
import * as cheerio from 'cheerio';
import type { Article, ArticleSource } from '../types/index';
import { config } from '../config/index';
import { RequestTimeoutError, ResponseTooLargeError, UpstreamFetchError } from '../errors/index';
import { fetchWithTimeout, readTextWithLimit } from '../utils/http';
import { LoggerService } from './logger';

export const ARTICLE_USER_AGENT = 'Mozilla/5.0 (compatible; PersonaLinkBot/1.0)';

/** Pages larger than this are not downloaded */
export const ARTICLE_MAX_BYTES = 5 * 1024 * 1024;

/**
 * Elements that never hold article text
 */
const NOISE_SELECTOR = 'script, style, noscript, nav, header, footer, aside, form, iframe, svg';
const BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, li, blockquote, pre';
const ROOT_CANDIDATES = ['article', 'main', '[role="main"]', 'body'];

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extracts title and main text from an HTML document.
 * Only static markup is read; script-rendered pages yield no content.
 */
export function extractArticle(html: string, url: string): Article {
  const $ = cheerio.load(html);

  const title =
    normalizeWhitespace($('meta[property="og:title"]').attr('content') ?? '') ||
    normalizeWhitespace($('title').first().text()) ||
    normalizeWhitespace($('h1').first().text()) ||
    null;

  $(NOISE_SELECTOR).remove();

  // The parser always creates <body>, so a root is always found
  const rootSelector = ROOT_CANDIDATES.find((selector) => $(selector).length > 0) ?? 'body';
  const root = $(rootSelector).first();

  // Outermost blocks only, so nested blocks are not repeated
  const blocks = root
    .find(BLOCK_SELECTOR)
    .toArray()
    .filter((element) => $(element).parents(BLOCK_SELECTOR).length === 0)
    .map((element) => normalizeWhitespace($(element).text()))
    .filter((text) => text.length > 0);

  const content = blocks.length > 0 ? blocks.join('\n') : normalizeWhitespace(root.text());

  return { url, title, content };
}

function classifyStatus(status: number, url: string): UpstreamFetchError {
  const details = { status, url };
  if (status === 404 || status === 410) {
    return new UpstreamFetchError('NotFound', `HTTP ${status}`, details);
  }
  if (status === 401 || status === 403) {
    return new UpstreamFetchError('Forbidden', `HTTP ${status}`, details);
  }
  if (status === 408) {
    return new UpstreamFetchError('Timeout', `HTTP ${status}`, details);
  }
  return new UpstreamFetchError('HttpError', `HTTP ${status}`, details);
}

export interface ArticleFetcherOptions {
  timeout?: number;
  userAgent?: string;
  maxBytes?: number;
}

/**
 * Fetches static HTML articles over http(s)
 */
export class ArticleFetcherService implements ArticleSource {
  private readonly logger: LoggerService;
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly maxBytes: number;

  constructor(logger: LoggerService, options: ArticleFetcherOptions = {}) {
    this.logger = logger;
    this.timeout = options.timeout ?? config.article.fetchTimeout;
    this.userAgent = options.userAgent ?? ARTICLE_USER_AGENT;
    this.maxBytes = options.maxBytes ?? ARTICLE_MAX_BYTES;
  }

  /**
   * @throws UpstreamFetchError with the failure reason
   */
  async fetchArticle(url: string): Promise<Article> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new UpstreamFetchError('InvalidUrl', 'URL could not be parsed', { url });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new UpstreamFetchError('InvalidUrl', `Unsupported protocol ${parsed.protocol}`, { url });
    }

    this.logger.debug('Fetching article', { url });

    let html: string;
    try {
      html = await fetchWithTimeout(
        parsed.toString(),
        {
          method: 'GET',
          redirect: 'follow',
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
          },
        },
        this.timeout,
        (response) => this.readHtml(response, url)
      );
    } catch (error) {
      if (error instanceof UpstreamFetchError) {
        throw error;
      }
      if (error instanceof RequestTimeoutError) {
        throw new UpstreamFetchError('Timeout', error.message, { url });
      }
      if (error instanceof ResponseTooLargeError) {
        throw new UpstreamFetchError('TooLarge', error.message, { url, maxBytes: error.maxBytes });
      }
      throw new UpstreamFetchError('NetworkError', 'Network request failed', {
        url,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const article = extractArticle(html, url);
    if (!article.content) {
      throw new UpstreamFetchError('UnsupportedContent', 'No extractable text', { url });
    }

    this.logger.debug('Article extracted', {
      url,
      title: article.title,
      contentLength: article.content.length,
    });
    return article;
  }

  private async readHtml(response: Response, url: string): Promise<string> {
    if (!response.ok) {
      throw classifyStatus(response.status, url);
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType && !/html/i.test(contentType)) {
      throw new UpstreamFetchError('UnsupportedContent', `Unsupported content type ${contentType}`, {
        url,
        contentType,
      });
    }

    return readTextWithLimit(response, this.maxBytes);
  }
}
