import { Article, JsonValue, NewsProviderKind, RawDocument, isJsonObject } from '../../types/news.types.js';
import { NotFoundError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { ProcessedNewsStorageService } from '../storage/processed-news-storage.service.js';
import { RawNewsStorageService } from '../storage/raw-news-storage.service.js';
import { normalizeArticles } from './article-normalizer.js';

export interface ProcessOptions {
  /** Explicit processed output file */
  outputPath?: string;
}

export interface ProcessResult {
  articles: Article[];
  filePath: string;
}

/**
 * News Processor Service
 *
 * raw document → normalized articles (NewsAPI first, then GNews) → processed document
 */
export class NewsProcessorService {
  private logger;

  constructor(
    private readonly rawStorage: RawNewsStorageService,
    private readonly processedStorage: ProcessedNewsStorageService,
  ) {
    this.logger = getLogger();
  }

  /**
   * @throws NotFoundError if nothing was fetched for the company, or the
   * stored responses hold no articles
   */
  async process(company: string, options: ProcessOptions = {}): Promise<ProcessResult> {
    const document = await this.rawStorage.load(company);
    const articles = extractArticles(document);

    if (articles.length === 0) {
      throw new NotFoundError('Stored articles', company.toUpperCase());
    }

    const filePath = await this.processedStorage.save(company, articles, { outputPath: options.outputPath });

    this.logger.info({ company, count: articles.length, path: filePath }, 'Processed stored articles');
    return { articles, filePath };
  }
}

/**
 * Normalized articles from the current top-level responses of a raw document
 */
export function extractArticles(document: RawDocument): Article[] {
  return [...slotArticles(document.newsapi, 'newsapi'), ...slotArticles(document.gnews, 'gnews')];
}

function slotArticles(response: JsonValue, provider: NewsProviderKind): Article[] {
  return isJsonObject(response) ? normalizeArticles(response.articles, provider) : [];
}
