import { Article, CompanySummary } from '../../types/news.types.js';
import { ValidationError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { articleToText } from './article-normalizer.js';
import { SummaryProvider } from './news-provider.interface.js';

export class NewsSummarizerService {
  private logger;

  constructor(private readonly summaryProvider: SummaryProvider) {
    this.logger = getLogger();
  }

  async summarize(company: string, articles: Article[]): Promise<CompanySummary> {
    if (articles.length === 0) {
      throw new ValidationError(`No articles to summarize for ${company}`);
    }

    const text = articles.map(articleToText).join('\n\n');
    const summary = await this.summaryProvider.summarize(text);

    this.logger.info({ company, articleCount: articles.length, sentiment: summary.sentiment }, 'Summarized articles');
    return { company, article_count: articles.length, ...summary };
  }
}
