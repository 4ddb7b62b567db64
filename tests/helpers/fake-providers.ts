import { normalizeArticles } from '../../src/services/news/article-normalizer.js';
import {
  FetchNewsOptions,
  FetchNewsResult,
  NewsProvider,
  SummaryProvider,
} from '../../src/services/news/news-provider.interface.js';
import { ArticleSummary, JsonObject, NewsProviderKind } from '../../src/types/news.types.js';

/**
 * News provider answering every query with a fixed response body
 */
export class FakeNewsProvider implements NewsProvider {
  readonly calls: Array<{ query: string; options?: FetchNewsOptions }> = [];

  constructor(
    readonly name: NewsProviderKind,
    private readonly response: JsonObject | Error,
  ) {}

  async fetch(query: string, options?: FetchNewsOptions): Promise<FetchNewsResult> {
    this.calls.push({ query, options });
    if (this.response instanceof Error) {
      throw this.response;
    }
    return { articles: normalizeArticles(this.response.articles, this.name), raw: this.response };
  }
}

export class FakeSummaryProvider implements SummaryProvider {
  readonly inputs: string[] = [];

  constructor(private readonly summary: ArticleSummary) {}

  async summarize(text: string): Promise<ArticleSummary> {
    this.inputs.push(text);
    return this.summary;
  }
}

export function newsApiBody(titles: string[]): JsonObject {
  return {
    status: 'ok',
    totalResults: titles.length,
    articles: titles.map((title, index) => ({
      source: { id: null, name: 'Example Wire' },
      title,
      url: `https://example.com/newsapi/${index + 1}`,
      publishedAt: '2024-05-01T10:00:00Z',
    })),
  };
}

export function gnewsBody(titles: string[]): JsonObject {
  return {
    totalArticles: titles.length,
    articles: titles.map((title, index) => ({
      title,
      url: `https://example.com/gnews/${index + 1}`,
      publishedAt: '2024-05-01T11:00:00Z',
      source: { name: 'Daily Example', url: 'https://example.com' },
    })),
  };
}
