import { describe, it, expect } from 'vitest';
import { createStubClient } from '../../../../tests/helpers/http-stub.js';
import { ConfigurationError, ExternalApiError } from '../../../utils/errors.js';
import { NewsApiAdapter } from '../news-api.adapter.js';

const EVERYTHING_RESPONSE = {
  status: 'ok',
  totalResults: 2,
  articles: [
    {
      source: { id: null, name: 'Example Wire' },
      author: 'Jane Doe',
      title: 'Apple beats estimates',
      description: 'Revenue rose.',
      url: 'https://example.com/apple',
      urlToImage: null,
      publishedAt: '2024-05-02T20:30:00Z',
      content: 'Apple reported...',
    },
    {
      source: { id: null, name: 'Other Desk' },
      title: 'Analysts weigh in',
      url: 'https://example.com/analysts',
      publishedAt: '2024-05-02T18:00:00Z',
    },
  ],
};

describe('NewsApiAdapter', () => {
  it('should search everything sorted by publish date', async () => {
    const { client, requests } = createStubClient(() => ({ status: 200, data: EVERYTHING_RESPONSE }));
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    await adapter.fetch('AAPL');

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('get');
    expect(requests[0].url).toBe('/v2/everything');
    expect(requests[0].params).toEqual({
      q: 'AAPL',
      sortBy: 'publishedAt',
      language: 'en',
      pageSize: 5,
      apiKey: 'test-key',
    });
  });

  it('should pass limit and language through', async () => {
    const { client, requests } = createStubClient(() => ({ status: 200, data: EVERYTHING_RESPONSE }));
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    await adapter.fetch('Siemens', { limit: 20, language: 'de' });

    expect(requests[0].params).toMatchObject({ q: 'Siemens', language: 'de', pageSize: 20 });
  });

  it('should return normalized articles together with the untouched body', async () => {
    const { client } = createStubClient(() => ({ status: 200, data: EVERYTHING_RESPONSE }));
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    const result = await adapter.fetch('AAPL');

    expect(result.raw).toEqual(EVERYTHING_RESPONSE);
    expect(result.articles).toEqual([
      {
        title: 'Apple beats estimates',
        description: 'Revenue rose.',
        content: 'Apple reported...',
        url: 'https://example.com/apple',
        source_name: 'Example Wire',
        published_at: '2024-05-02T20:30:00Z',
      },
      {
        title: 'Analysts weigh in',
        description: null,
        content: null,
        url: 'https://example.com/analysts',
        source_name: 'Other Desk',
        published_at: '2024-05-02T18:00:00Z',
      },
    ]);
  });

  it('should return no articles when the body has none', async () => {
    const { client } = createStubClient(() => ({ status: 200, data: { status: 'ok', totalResults: 0 } }));
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    expect((await adapter.fetch('ZZZZ')).articles).toEqual([]);
  });

  it('should report the upstream message on an error status', async () => {
    const { client } = createStubClient(() => ({
      status: 401,
      data: { status: 'error', code: 'apiKeyInvalid', message: 'Your API key is invalid.' },
    }));
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    const error = await adapter.fetch('AAPL').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExternalApiError);
    expect(error).toHaveProperty('message', 'NewsAPI API error: Failed to fetch: 401 - Your API key is invalid.');
    expect(error).toHaveProperty('upstreamStatus', 401);
  });

  it('should wrap transport failures', async () => {
    const { client } = createStubClient(() => {
      throw new Error('socket hang up');
    });
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    await expect(adapter.fetch('AAPL')).rejects.toThrow('NewsAPI API error: request failed: socket hang up');
  });

  it('should reject a body that is not a JSON object', async () => {
    const { client } = createStubClient(() => ({ status: 200, data: [1, 2, 3] }));
    const adapter = new NewsApiAdapter({ apiKey: 'test-key', client });

    await expect(adapter.fetch('AAPL')).rejects.toThrow('NewsAPI API error: response body is not a JSON object');
  });

  it('should refuse to call out without an API key', async () => {
    const { client, requests } = createStubClient(() => ({ status: 200, data: EVERYTHING_RESPONSE }));
    const adapter = new NewsApiAdapter({ client });

    await expect(adapter.fetch('AAPL')).rejects.toThrow(ConfigurationError);
    expect(requests).toHaveLength(0);
  });
});
