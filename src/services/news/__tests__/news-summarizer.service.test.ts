import { describe, it, expect } from 'vitest';
import { FakeSummaryProvider } from '../../../../tests/helpers/fake-providers.js';
import { Article } from '../../../types/news.types.js';
import { ValidationError } from '../../../utils/errors.js';
import { NewsSummarizerService } from '../news-summarizer.service.js';

const SUMMARY = {
  summary: 'Mixed week for the company.',
  key_points: ['Product launch', 'Lawsuit filed'],
  sentiment: 'neutral',
  potential_impact: 'Limited short-term movement.',
};

const ARTICLES: Article[] = [
  {
    title: 'Launch day',
    description: 'New phone shipped.',
    content: null,
    url: 'https://example.com/launch',
    source_name: 'Example Wire',
    published_at: '2024-05-01',
  },
  {
    title: 'Lawsuit filed',
    description: null,
    content: null,
    url: null,
    source_name: null,
    published_at: null,
  },
];

describe('NewsSummarizerService', () => {
  it('should send every article as one text block', async () => {
    const provider = new FakeSummaryProvider(SUMMARY);
    const service = new NewsSummarizerService(provider);

    await service.summarize('AAPL', ARTICLES);

    expect(provider.inputs).toEqual([
      'Title: Launch day\nSource: Example Wire\nDate: 2024-05-01\nURL: https://example.com/launch\nDescription: New phone shipped.' +
        '\n\n' +
        'Title: Lawsuit filed\nSource: Unknown source\nDate: Unknown date\nURL: No URL',
    ]);
  });

  it('should label the summary with company and article count', async () => {
    const service = new NewsSummarizerService(new FakeSummaryProvider(SUMMARY));

    expect(await service.summarize('AAPL', ARTICLES)).toEqual({ company: 'AAPL', article_count: 2, ...SUMMARY });
  });

  it('should reject an empty batch without calling the model', async () => {
    const provider = new FakeSummaryProvider(SUMMARY);
    const service = new NewsSummarizerService(provider);

    await expect(service.summarize('AAPL', [])).rejects.toThrow(ValidationError);
    await expect(service.summarize('AAPL', [])).rejects.toThrow('No articles to summarize for AAPL');
    expect(provider.inputs).toEqual([]);
  });
});
