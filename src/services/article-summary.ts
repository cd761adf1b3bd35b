/**
 * Article summary service - fetch, truncate and summarize an article in a persona's voice
 */
import type {
  ArticleSource,
  ArticleSummary,
  CompletionService,
  Persona,
  PersonaInfo,
  PersonaSource,
} from '../types/index';
import { config } from '../config/index';
import { PersonaNotFoundError } from '../errors/index';
import { LoggerService } from './logger';

export const DEFAULT_SUMMARIZER_INSTRUCTION =
  'You are a concise, neutral summarizer. Capture the main points of an article accurately in plain language.';

export const DEFAULT_SUMMARIZER_INFO: PersonaInfo = {
  name: 'Summarizer',
  icon: '📰',
  color: 0x5865f2,
  description: 'Plain article summaries',
};

export const UNTITLED_ARTICLE = '(untitled)';

export interface ArticleSummaryOptions {
  maxChars?: number;
  summaryMinLength?: number;
  summaryMaxLength?: number;
}

/**
 * Cuts text to maxChars, marking the cut with a trailing ellipsis
 */
export function truncateArticle(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: `${text.slice(0, maxChars)}...`, truncated: true };
}

export function toPersonaInfo(persona: Persona): PersonaInfo {
  return {
    name: persona.name,
    icon: persona.icon,
    color: persona.color,
    description: persona.description,
  };
}

/**
 * Shared by the chat URL path and the HTTP ingest endpoint
 */
export class ArticleSummaryService {
  private readonly articles: ArticleSource;
  private readonly completion: CompletionService;
  private readonly personas: PersonaSource;
  private readonly logger: LoggerService;
  private readonly maxChars: number;
  private readonly summaryMinLength: number;
  private readonly summaryMaxLength: number;

  constructor(
    deps: {
      articles: ArticleSource;
      completion: CompletionService;
      personas: PersonaSource;
      logger: LoggerService;
    },
    options: ArticleSummaryOptions = {}
  ) {
    this.articles = deps.articles;
    this.completion = deps.completion;
    this.personas = deps.personas;
    this.logger = deps.logger;
    this.maxChars = options.maxChars ?? config.article.maxChars;
    this.summaryMinLength = options.summaryMinLength ?? config.article.summaryMinLength;
    this.summaryMaxLength = options.summaryMaxLength ?? config.article.summaryMaxLength;
  }

  /**
   * User prompt asking for a summary of the (already truncated) article
   */
  buildPrompt(title: string, content: string): string {
    return [
      `Summarize the following article in your own voice in ${this.summaryMinLength} to ${this.summaryMaxLength} characters.`,
      '',
      `Article title: ${title}`,
      '',
      'Article body:',
      content,
      '',
      'Write the summary:',
    ].join('\n');
  }

  /**
   * @param personaId - Persona voice to use; null for the default summarizer
   * @throws PersonaNotFoundError before any fetch if the persona is unknown
   * @throws UpstreamFetchError if the article cannot be fetched
   * @throws UpstreamLLMError if the completion fails
   */
  async summarize(url: string, personaId: string | null): Promise<ArticleSummary> {
    let persona: Persona | undefined;
    if (personaId !== null) {
      persona = this.personas.getPersona(personaId);
      if (!persona) {
        throw new PersonaNotFoundError(personaId, this.personas.listPersonaIds());
      }
    }

    const article = await this.articles.fetchArticle(url);
    const { text, truncated } = truncateArticle(article.content, this.maxChars);
    const title = article.title ?? UNTITLED_ARTICLE;

    const summary = await this.completion.complete(
      persona?.systemPrompt ?? DEFAULT_SUMMARIZER_INSTRUCTION,
      [{ role: 'user', content: this.buildPrompt(title, text) }]
    );

    this.logger.info('Article summary generated', {
      url,
      personaId: persona?.id ?? null,
      truncated,
      summaryLength: summary.length,
    });

    return {
      summary,
      persona: persona?.id ?? 'none',
      personaInfo: persona ? toPersonaInfo(persona) : { ...DEFAULT_SUMMARIZER_INFO },
      articleTitle: title,
      articleUrl: url,
      truncated,
    };
  }
}
