import { AxiosInstance } from 'axios';
import { NEWS_PROVIDERS, PROVIDER_DEFAULTS } from '../../config/constants.js';
import { getEnvironment } from '../../config/environment.js';
import { normalizeArticles } from '../../services/news/article-normalizer.js';
import { FetchNewsOptions, FetchNewsResult, NewsProvider } from '../../services/news/news-provider.interface.js';
import { ConfigurationError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { createHttpClient, requestJsonObject } from '../http.client.js';

export interface GNewsApiAdapterOptions {
  apiKey?: string;
  client?: AxiosInstance;
}

/**
 * Adapter for the GNews v4 search endpoint
 *
 * GNews nests the publisher under `source: { name, url }`; articles are
 * normalized with "Unknown" for a missing publisher name.
 */
export class GNewsApiAdapter implements NewsProvider {
  readonly name = NEWS_PROVIDERS.GNEWS;
  private client: AxiosInstance;
  private apiKey: string | undefined;
  private logger;

  constructor(options: GNewsApiAdapterOptions = {}) {
    const env = getEnvironment();
    this.logger = getLogger();
    this.apiKey = options.apiKey ?? env.GNEWS_API_KEY;
    this.client = options.client ?? createHttpClient(env.GNEWS_API_BASE_URL, env.HTTP_TIMEOUT_MS);
  }

  async fetch(query: string, options: FetchNewsOptions = {}): Promise<FetchNewsResult> {
    if (!this.apiKey) {
      throw new ConfigurationError('GNEWS_API_KEY is required but not configured');
    }

    this.logger.debug(
      { query, limit: options.limit, language: options.language, country: options.country },
      'Fetching articles from GNews',
    );

    const raw = await requestJsonObject(
      this.client,
      'GNews',
      {
        method: 'GET',
        path: '/api/v4/search',
        params: {
          q: query,
          lang: options.language ?? PROVIDER_DEFAULTS.LANGUAGE,
          country: options.country ?? PROVIDER_DEFAULTS.COUNTRY,
          max: options.limit ?? PROVIDER_DEFAULTS.GNEWS_MAX_RESULTS,
          apikey: this.apiKey,
        },
      },
      this.logger,
    );

    const articles = normalizeArticles(raw.articles, this.name);
    this.logger.debug({ query, count: articles.length }, 'Fetched GNews articles');

    return { articles, raw };
  }
}
