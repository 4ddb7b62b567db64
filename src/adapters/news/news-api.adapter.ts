import { AxiosInstance } from 'axios';
import { NEWS_PROVIDERS, PROVIDER_DEFAULTS } from '../../config/constants.js';
import { getEnvironment } from '../../config/environment.js';
import { normalizeArticles } from '../../services/news/article-normalizer.js';
import { FetchNewsOptions, FetchNewsResult, NewsProvider } from '../../services/news/news-provider.interface.js';
import { ConfigurationError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { createHttpClient, requestJsonObject } from '../http.client.js';

export interface NewsApiAdapterOptions {
  apiKey?: string;
  client?: AxiosInstance;
}

/**
 * Adapter for NewsAPI "everything" search
 *
 * Free tier limits:
 * - 100 requests per day
 * - Articles up to a month old
 *
 * Results are sorted newest first and restricted to one language.
 */
export class NewsApiAdapter implements NewsProvider {
  readonly name = NEWS_PROVIDERS.NEWSAPI;
  private client: AxiosInstance;
  private apiKey: string | undefined;
  private logger;

  constructor(options: NewsApiAdapterOptions = {}) {
    const env = getEnvironment();
    this.logger = getLogger();
    this.apiKey = options.apiKey ?? env.NEWS_API_KEY;
    this.client = options.client ?? createHttpClient(env.NEWS_API_BASE_URL, env.HTTP_TIMEOUT_MS);
  }

  /**
   * Search articles mentioning a company
   *
   * @param query Company name or ticker (e.g., "AAPL")
   */
  async fetch(query: string, options: FetchNewsOptions = {}): Promise<FetchNewsResult> {
    const apiKey = this.requireApiKey();

    this.logger.debug({ query, limit: options.limit }, 'Fetching articles from NewsAPI');

    const raw = await requestJsonObject(
      this.client,
      'NewsAPI',
      {
        method: 'GET',
        path: '/v2/everything',
        params: {
          q: query,
          sortBy: 'publishedAt',
          language: options.language ?? PROVIDER_DEFAULTS.LANGUAGE,
          pageSize: options.limit ?? PROVIDER_DEFAULTS.NEWSAPI_PAGE_SIZE,
          apiKey,
        },
      },
      this.logger,
    );

    const articles = normalizeArticles(raw.articles, this.name);
    this.logger.debug({ query, count: articles.length }, 'Fetched NewsAPI articles');

    return { articles, raw };
  }

  private requireApiKey(): string {
    if (!this.apiKey) {
      throw new ConfigurationError('NEWS_API_KEY is required but not configured');
    }
    return this.apiKey;
  }
}
