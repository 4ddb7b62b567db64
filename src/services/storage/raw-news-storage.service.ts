import { resolveRawDataDir, symbolDocumentPath } from '../../config/constants.js';
import { RawDocument, RawResponses } from '../../types/news.types.js';
import { CorruptDocumentError } from '../../utils/errors.js';
import { ensureDirectory } from '../../utils/file.utils.js';
import { getLogger } from '../../utils/logger.js';
import { listSymbols } from './catalog.js';
import { rawDocumentSchema } from './document.schemas.js';
import { DocumentProfile, HistoryMergeService, readDocument } from './history-merge.service.js';

export const RAW_DOCUMENT_PROFILE: DocumentProfile = {
  name: 'raw',
  documentKeys: ['timestamp', 'stock', 'newsapi', 'gnews'],
  snapshotKeys: ['timestamp', 'newsapi', 'gnews'],
  slotDefaults: { newsapi: {}, gnews: {} },
};

export interface RawNewsStorageOptions {
  /** Overrides RAW_DATA_PATH and the <cwd>/data/raw_data default */
  directory?: string;
}

/**
 * Raw provider responses, one document per symbol
 *
 * Path structure: {directory}/{SYMBOL}.json
 * Example: ./data/raw_data/AAPL.json
 */
export class RawNewsStorageService {
  private logger;
  private engine: HistoryMergeService;
  readonly directory: string;

  constructor(options: RawNewsStorageOptions = {}) {
    this.logger = getLogger();
    this.directory = resolveRawDataDir(options.directory);
    this.engine = new HistoryMergeService(RAW_DOCUMENT_PROFILE);
  }

  pathFor(symbol: string): string {
    return symbolDocumentPath(this.directory, symbol);
  }

  /**
   * Fold new provider responses into the symbol's history log
   *
   * @param symbol Company name or ticker (case-insensitive)
   * @param responses Provider responses; a provider left out keeps its stored response
   * @returns Document path
   */
  async merge(symbol: string, responses: RawResponses, now?: Date): Promise<string> {
    await ensureDirectory(this.directory);

    const filePath = await this.engine.merge(
      this.pathFor(symbol),
      { stock: symbol.toUpperCase(), newsapi: responses.newsapi, gnews: responses.gnews },
      now,
    );

    this.logger.info(
      { symbol: symbol.toUpperCase(), providers: Object.keys(responses), path: filePath },
      'Raw responses merged',
    );
    return filePath;
  }

  /**
   * Overwrite the symbol's document with a flat one (no history)
   *
   * @returns Document path
   */
  async store(symbol: string, responses: RawResponses, now?: Date): Promise<string> {
    await ensureDirectory(this.directory);

    return this.engine.create(
      this.pathFor(symbol),
      { stock: symbol.toUpperCase(), newsapi: responses.newsapi, gnews: responses.gnews },
      now,
    );
  }

  /**
   * Load the stored document for a symbol
   *
   * @throws NotFoundError if nothing was fetched for the symbol yet
   * @throws CorruptDocumentError if the file is not a raw document
   */
  async load(symbol: string): Promise<RawDocument> {
    const filePath = this.pathFor(symbol);
    const document = await readDocument(filePath, 'Raw news data', symbol.toUpperCase());

    const parsed = rawDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new CorruptDocumentError(filePath, parsed.error.issues[0]?.message ?? 'unexpected shape');
    }
    return { ...parsed.data, stock: parsed.data.stock ?? symbol.toUpperCase() };
  }

  async listSymbols(): Promise<Set<string>> {
    return listSymbols(this.directory);
  }
}
