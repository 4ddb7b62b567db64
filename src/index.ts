export * from './types/news.types.js';
export * from './utils/errors.js';
export { loadEnvironment, getEnvironment, parseEnvironment } from './config/environment.js';
export type { Environment } from './config/environment.js';
export { createLogger, getLogger } from './utils/logger.js';
export { normalizeArticle, normalizeArticles, articleToText } from './services/news/article-normalizer.js';
export type {
  FetchNewsOptions,
  FetchNewsResult,
  NewsProvider,
  SummaryProvider,
} from './services/news/news-provider.interface.js';
export { ProviderRegistry, createProviderRegistry } from './services/news/provider.registry.js';
export { NewsIngestionService } from './services/news/news-ingestion.service.js';
export { NewsProcessorService, extractArticles } from './services/news/news-processor.service.js';
export { NewsSummarizerService } from './services/news/news-summarizer.service.js';
export { HistoryMergeService, parseDocument, readDocument } from './services/storage/history-merge.service.js';
export type { DocumentProfile, PayloadSlots } from './services/storage/history-merge.service.js';
export { RawNewsStorageService, RAW_DOCUMENT_PROFILE } from './services/storage/raw-news-storage.service.js';
export {
  ProcessedNewsStorageService,
  PROCESSED_DOCUMENT_PROFILE,
} from './services/storage/processed-news-storage.service.js';
export { listSymbols } from './services/storage/catalog.js';
export { NewsApiAdapter } from './adapters/news/news-api.adapter.js';
export { GNewsApiAdapter } from './adapters/news/gnews-api.adapter.js';
export { OpenAiSummaryAdapter } from './adapters/llm/openai-summary.adapter.js';
