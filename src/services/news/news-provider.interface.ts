import { Article, ArticleSummary, JsonObject, NewsProviderKind } from '../../types/news.types.js';

export interface FetchNewsOptions {
  /** Maximum number of articles (provider default when omitted) */
  limit?: number;
  /** Two-letter language code */
  language?: string;
  /** Two-letter country code; ignored by providers without a country filter */
  country?: string;
}

export interface FetchNewsResult {
  articles: Article[];
  /** Provider response body, stored as-is */
  raw: JsonObject;
}

/**
 * A news API that can be queried by company name or ticker
 */
export interface NewsProvider {
  readonly name: NewsProviderKind;

  /**
   * @throws ConfigurationError if the provider's API key is missing
   * @throws ExternalApiError on a non-2xx status or transport failure
   */
  fetch(query: string, options?: FetchNewsOptions): Promise<FetchNewsResult>;
}

export interface SummaryProvider {
  /**
   * Summarize a block of article text. Unparseable model output yields a
   * fallback summary instead of an error.
   */
  summarize(text: string): Promise<ArticleSummary>;
}
