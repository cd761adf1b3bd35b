/**
 * Article fetching and summary type definitions
 */
import type { PersonaInfo } from './persona';

/**
 * Article text extracted from a web page
 */
export interface Article {
  url: string;
  title: string | null;
  content: string;
}

/**
 * Capability for fetching and extracting an article
 */
export interface ArticleSource {
  fetchArticle(url: string): Promise<Article>;
}

/**
 * Result of the URL summarization path
 */
export interface ArticleSummary {
  summary: string;
  /** Persona id used, or 'none' for the default summarizer voice */
  persona: string;
  personaInfo: PersonaInfo;
  articleTitle: string;
  articleUrl: string;
  truncated: boolean;
}
