import path from 'path';
import { getEnvironment } from './environment.js';

export const DOCUMENT_EXTENSION = '.json';

export const DEFAULT_ARTICLE_TITLE = 'No title';
export const DEFAULT_GNEWS_SOURCE_NAME = 'Unknown';

/** Timestamp recorded for a snapshot whose source document carried none */
export const UNKNOWN_TIMESTAMP = 'unknown';

export const NEWS_PROVIDERS = {
  NEWSAPI: 'newsapi',
  GNEWS: 'gnews',
} as const;

export const PROVIDER_DEFAULTS = {
  NEWSAPI_PAGE_SIZE: 5,
  GNEWS_MAX_RESULTS: 10,
  LANGUAGE: 'en',
  COUNTRY: 'us',
} as const;

export const SUMMARY_TEMPERATURE = 0.5;

/**
 * Raw provider responses live under RAW_DATA_PATH, or <cwd>/data/raw_data.
 */
export function resolveRawDataDir(explicit?: string): string {
  return explicit ?? getEnvironment().RAW_DATA_PATH ?? path.join(process.cwd(), 'data', 'raw_data');
}

/**
 * Processed article batches live under PROCESSED_DATA_PATH, or <cwd>/data/processed.
 */
export function resolveProcessedDataDir(explicit?: string): string {
  return explicit ?? getEnvironment().PROCESSED_DATA_PATH ?? path.join(process.cwd(), 'data', 'processed');
}

/**
 * Map a company symbol to its one document path: <dir>/<SYMBOL>.json
 */
export function symbolDocumentPath(directory: string, symbol: string): string {
  return path.join(directory, `${symbol.toUpperCase()}${DOCUMENT_EXTENSION}`);
}
