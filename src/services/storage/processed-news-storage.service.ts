import path from 'path';
import { resolveProcessedDataDir, symbolDocumentPath } from '../../config/constants.js';
import { Article, ProcessedDocument } from '../../types/news.types.js';
import { CorruptDocumentError } from '../../utils/errors.js';
import { ensureDirectory } from '../../utils/file.utils.js';
import { getLogger } from '../../utils/logger.js';
import { processedDocumentSchema } from './document.schemas.js';
import { DocumentProfile, HistoryMergeService, readDocument } from './history-merge.service.js';

/**
 * Snapshots keep the whole batch (label, count, timestamp, articles) together.
 * A legacy batch without a label is snapshotted under the company being saved.
 */
export const PROCESSED_DOCUMENT_PROFILE: DocumentProfile = {
  name: 'processed',
  documentKeys: ['company', 'article_count', 'timestamp', 'articles'],
  snapshotKeys: ['company', 'article_count', 'timestamp', 'articles'],
  slotDefaults: { article_count: 0, articles: [] },
};

export interface ProcessedNewsStorageOptions {
  /** Overrides PROCESSED_DATA_PATH and the <cwd>/data/processed default */
  directory?: string;
}

export interface SaveProcessedOptions {
  /** Explicit output file; defaults to {directory}/{COMPANY}.json */
  outputPath?: string;
  now?: Date;
}

/**
 * Normalized article batches, one document per company
 */
export class ProcessedNewsStorageService {
  private logger;
  private engine: HistoryMergeService;
  readonly directory: string;

  constructor(options: ProcessedNewsStorageOptions = {}) {
    this.logger = getLogger();
    this.directory = resolveProcessedDataDir(options.directory);
    this.engine = new HistoryMergeService(PROCESSED_DOCUMENT_PROFILE);
  }

  pathFor(symbol: string): string {
    return symbolDocumentPath(this.directory, symbol);
  }

  /**
   * Merge a processed batch into the company's history log
   *
   * @param company Company label, stored as given
   * @param articles Normalized articles
   * @returns Document path
   */
  async save(company: string, articles: Article[], options: SaveProcessedOptions = {}): Promise<string> {
    const filePath = options.outputPath ?? this.pathFor(company);
    await ensureDirectory(path.dirname(filePath));

    await this.engine.merge(
      filePath,
      { company, article_count: articles.length, articles },
      options.now,
    );

    this.logger.info({ company, articleCount: articles.length, path: filePath }, 'Processed articles saved');
    return filePath;
  }

  /**
   * @throws NotFoundError if the company was never processed
   * @throws CorruptDocumentError if the file is not a processed document
   */
  async load(symbol: string, filePath: string = this.pathFor(symbol)): Promise<ProcessedDocument> {
    const document = await readDocument(filePath, 'Processed news data', symbol.toUpperCase());

    const parsed = processedDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new CorruptDocumentError(filePath, parsed.error.issues[0]?.message ?? 'unexpected shape');
    }
    return parsed.data;
  }
}
