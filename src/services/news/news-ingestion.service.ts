import { Article, RawResponses } from '../../types/news.types.js';
import { getLogger } from '../../utils/logger.js';
import { RawNewsStorageService } from '../storage/raw-news-storage.service.js';
import { FetchNewsOptions } from './news-provider.interface.js';
import { ProviderRegistry } from './provider.registry.js';

export interface IngestionResult {
  articles: Article[];
  /** Raw document path, or null when nothing was stored */
  filePath: string | null;
}

/**
 * News Ingestion Service
 *
 * fetch (one provider) → merge raw response into the symbol's raw document
 *
 * The response lands in the provider's own slot; the other provider's
 * slot keeps its previous value.
 */
export class NewsIngestionService {
  private logger;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly rawStorage: RawNewsStorageService,
  ) {
    this.logger = getLogger();
  }

  /**
   * @param providerName Registered provider ("newsapi" or "gnews")
   * @param company Company name or ticker, also the storage key
   */
  async fetch(providerName: string, company: string, options: FetchNewsOptions = {}): Promise<IngestionResult> {
    const provider = this.registry.get(providerName);
    const { articles, raw } = await provider.fetch(company, options);

    if (articles.length === 0) {
      this.logger.info({ provider: provider.name, company }, 'No articles returned, nothing stored');
      return { articles, filePath: null };
    }

    const responses: RawResponses = provider.name === 'newsapi' ? { newsapi: raw } : { gnews: raw };
    const filePath = await this.rawStorage.merge(company, responses);

    this.logger.info(
      { provider: provider.name, company, count: articles.length, path: filePath },
      'Ingested articles',
    );
    return { articles, filePath };
  }
}
