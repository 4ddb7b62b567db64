// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// ARTICLES
// ============================================================================

export type NewsProviderKind = 'newsapi' | 'gnews';

/**
 * Canonical article shape shared by every provider.
 * Field names are snake_case because they are written to disk as-is.
 */
export type Article = {
  title: string;
  description: string | null;
  content: string | null;
  url: string | null;
  source_name: string | null;
  /** ISO-8601 text exactly as the provider sent it */
  published_at: string | null;
};

// ============================================================================
// STORED DOCUMENTS
// ============================================================================

export interface RawSnapshot {
  timestamp: string;
  newsapi: JsonValue;
  gnews: JsonValue;
}

export interface RawDocument extends RawSnapshot {
  stock: string;
  history?: RawSnapshot[];
}

export interface ProcessedSnapshot {
  company: string;
  article_count: number;
  timestamp: string;
  articles: Article[];
}

export interface ProcessedDocument extends ProcessedSnapshot {
  history?: ProcessedSnapshot[];
}

export interface RawResponses {
  newsapi?: JsonObject;
  gnews?: JsonObject;
}

// ============================================================================
// SUMMARIES
// ============================================================================

export interface ArticleSummary {
  summary: string;
  key_points: string[];
  sentiment: string;
  potential_impact: string;
  /** Model output kept when it could not be parsed */
  raw_response?: string;
}

export interface CompanySummary extends ArticleSummary {
  company: string;
  article_count: number;
}
