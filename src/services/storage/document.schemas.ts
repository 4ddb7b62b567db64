import { z } from 'zod';
import { DEFAULT_ARTICLE_TITLE, NEWS_PROVIDERS, UNKNOWN_TIMESTAMP } from '../../config/constants.js';
import { JsonValue, isJsonObject } from '../../types/news.types.js';
import { normalizeArticle } from '../news/article-normalizer.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const nullableText = z.string().nullable().default(null);

// Older batches keep the publisher nested as `source: { name }`
export const articleSchema = z.preprocess(
  (value) => (isJsonObject(value) ? normalizeArticle(value, NEWS_PROVIDERS.NEWSAPI) : value),
  z.object({
    title: z.string().default(DEFAULT_ARTICLE_TITLE),
    description: nullableText,
    content: nullableText,
    url: nullableText,
    source_name: nullableText,
    published_at: nullableText,
  }),
);

// Raw documents: provider responses stay opaque

const rawSnapshotSchema = z.object({
  timestamp: z.string().default(UNKNOWN_TIMESTAMP),
  newsapi: jsonValueSchema.default({}),
  gnews: jsonValueSchema.default({}),
});

export const rawDocumentSchema = rawSnapshotSchema.extend({
  stock: z.string().optional(),
  history: z.array(rawSnapshotSchema).optional(),
});

// Processed documents

const processedSnapshotSchema = z.object({
  company: z.string(),
  article_count: z.number().int().nonnegative(),
  timestamp: z.string().default(UNKNOWN_TIMESTAMP),
  articles: z.array(articleSchema).default([]),
});

export const processedDocumentSchema = processedSnapshotSchema.extend({
  history: z.array(processedSnapshotSchema).optional(),
});
