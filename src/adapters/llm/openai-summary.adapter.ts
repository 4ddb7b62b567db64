import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SUMMARY_TEMPERATURE } from '../../config/constants.js';
import { getEnvironment } from '../../config/environment.js';
import { SummaryProvider } from '../../services/news/news-provider.interface.js';
import { ArticleSummary } from '../../types/news.types.js';
import { ConfigurationError, ExternalApiError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { createHttpClient, requestJsonObject } from '../http.client.js';

const SYSTEM_PROMPT =
  'You are a financial analyst tasked with preprocessing and summarizing news articles about a stock. ' +
  'Extract key information and provide reasoned insights.';

const summarySchema = z.object({
  summary: z.string(),
  key_points: z.array(z.string()),
  sentiment: z.string(),
  potential_impact: z.string(),
});

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export function buildSummaryPrompt(content: string): string {
  return `Summarize and reason out the key information from the following news articles about the stock:

${content}

Output your analysis in strict JSON format with the following structure:
{
  "summary": "The overall summary of the articles",
  "key_points": ["Point 1", "Point 2", "Point 3"],
  "sentiment": "positive/negative/neutral",
  "potential_impact": "Description of potential market impact"
}

Ensure your response is valid JSON without any markdown formatting or extra text.
`;
}

export function fallbackSummary(rawResponse: string): ArticleSummary {
  return {
    summary: 'Error parsing model output',
    key_points: ['Error in processing articles'],
    sentiment: 'neutral',
    potential_impact: 'Unable to analyze potential impact due to processing error',
    raw_response: rawResponse,
  };
}

/**
 * Parse model output into a summary, unwrapping a ```json fence if present.
 * Returns the fallback summary when the text is not the expected JSON.
 */
export function parseSummary(text: string): ArticleSummary {
  let body = text.trim();
  if (body.startsWith('```json') && body.endsWith('```')) {
    body = body.replace('```json', '').replace(/```$/, '').trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return fallbackSummary(body);
  }

  const result = summarySchema.safeParse(parsed);
  return result.success ? result.data : fallbackSummary(body);
}

export interface OpenAiSummaryAdapterOptions {
  apiKey?: string;
  model?: string;
  client?: AxiosInstance;
}

/**
 * Summary provider backed by an OpenAI-compatible chat completions endpoint
 */
export class OpenAiSummaryAdapter implements SummaryProvider {
  private client: AxiosInstance;
  private apiKey: string | undefined;
  private model: string;
  private logger;

  constructor(options: OpenAiSummaryAdapterOptions = {}) {
    const env = getEnvironment();
    this.logger = getLogger();
    this.apiKey = options.apiKey ?? env.OPENAI_API_KEY;
    this.model = options.model ?? env.OPENAI_MODEL;
    this.client = options.client ?? createHttpClient(env.OPENAI_API_BASE_URL, env.HTTP_TIMEOUT_MS);
  }

  async summarize(text: string): Promise<ArticleSummary> {
    if (!this.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required but not configured');
    }

    this.logger.debug({ model: this.model, inputLength: text.length }, 'Requesting summary');

    const response = await requestJsonObject(
      this.client,
      'OpenAI',
      {
        method: 'POST',
        path: '/chat/completions',
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildSummaryPrompt(text) },
          ],
          temperature: SUMMARY_TEMPERATURE,
        },
      },
      this.logger,
    );

    const completion = completionSchema.safeParse(response);
    if (!completion.success) {
      throw new ExternalApiError('OpenAI', 'unexpected completion shape', undefined, response);
    }

    const summary = parseSummary(completion.data.choices[0].message.content ?? '');
    if (summary.raw_response !== undefined) {
      this.logger.warn({ model: this.model }, 'Model output was not valid summary JSON');
    }
    return summary;
  }
}
