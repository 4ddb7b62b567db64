import { DEFAULT_ARTICLE_TITLE, DEFAULT_GNEWS_SOURCE_NAME } from '../../config/constants.js';
import { Article, JsonObject, NewsProviderKind, isJsonObject } from '../../types/news.types.js';

/**
 * Convert a provider article record into the canonical Article.
 *
 * Never throws: anything that is not a string becomes null, and a missing
 * title becomes "No title". GNews sources without a name are reported as
 * "Unknown"; NewsAPI sources are left null.
 */
export function normalizeArticle(record: unknown, provider: NewsProviderKind): Article {
  const fields: JsonObject = isJsonObject(record) ? record : {};

  return {
    title: textOrNull(fields.title) ?? DEFAULT_ARTICLE_TITLE,
    description: textOrNull(fields.description),
    content: textOrNull(fields.content),
    url: textOrNull(fields.url),
    source_name: sourceName(fields.source, fields.source_name, provider),
    published_at: textOrNull(fields.publishedAt) ?? textOrNull(fields.published_at),
  };
}

export function normalizeArticles(records: unknown, provider: NewsProviderKind): Article[] {
  if (!Array.isArray(records)) return [];
  return records.map((record) => normalizeArticle(record, provider));
}

/**
 * Plain-text rendering used as summarizer input.
 */
export function articleToText(article: Article): string {
  const parts = [
    `Title: ${article.title}`,
    `Source: ${article.source_name ?? 'Unknown source'}`,
    `Date: ${article.published_at ?? 'Unknown date'}`,
    `URL: ${article.url ?? 'No URL'}`,
  ];

  if (article.description) {
    parts.push(`Description: ${article.description}`);
  }
  if (article.content) {
    parts.push(`Content: ${article.content}`);
  }

  return parts.join('\n');
}

function sourceName(source: unknown, flattened: unknown, provider: NewsProviderKind): string | null {
  // Already-normalized records carry source_name directly
  const name = isJsonObject(source) ? textOrNull(source.name) : textOrNull(flattened);

  if (provider === 'gnews') {
    return name ?? DEFAULT_GNEWS_SOURCE_NAME;
  }
  return name;
}

function textOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}
