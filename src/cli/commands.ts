import { parseArgs } from 'node:util';
import { NEWS_PROVIDERS } from '../config/constants.js';
import { loadUserConfig, setUserConfigValue } from '../config/user-config.js';
import { Article, JsonValue, isJsonObject } from '../types/news.types.js';
import { ValidationError } from '../utils/errors.js';
import { normalizeArticles } from '../services/news/article-normalizer.js';
import { NewsIngestionService } from '../services/news/news-ingestion.service.js';
import { NewsProcessorService } from '../services/news/news-processor.service.js';
import { SummaryProvider } from '../services/news/news-provider.interface.js';
import { NewsSummarizerService } from '../services/news/news-summarizer.service.js';
import { ProviderRegistry } from '../services/news/provider.registry.js';
import { ProcessedNewsStorageService } from '../services/storage/processed-news-storage.service.js';
import { RawNewsStorageService } from '../services/storage/raw-news-storage.service.js';

export interface CliContext {
  registry: ProviderRegistry;
  /** Built on first use so commands without summaries need no API key */
  summaryProvider: () => SummaryProvider;
  out: (line: string) => void;
  err: (line: string) => void;
}

type Command = (args: string[], ctx: CliContext) => Promise<number>;

export const USAGE = `Usage: newsledger <command> [options]

Commands:
  fetch-news      --company <name> [--limit 5] [--raw-dir <dir>]
  fetch-gnews     --company <name> [--limit 10] [--language en] [--country us] [--raw-dir <dir>]
  process         --company <name> [--raw-dir <dir>] [--processed-dir <dir>] [--output <file>]
  show-news       --company <name> [--raw-dir <dir>] [--source all|newsapi|gnews]
  list-companies  [--raw-dir <dir>]
  summarize       --company <name> [--processed-dir <dir>]
  config          [get|set] [key] [value]`;

const COMMANDS: Record<string, Command> = {
  'fetch-news': fetchNewsCommand,
  'fetch-gnews': fetchGNewsCommand,
  process: processCommand,
  'show-news': showNewsCommand,
  'list-companies': listCompaniesCommand,
  summarize: summarizeCommand,
  config: configCommand,
};

/**
 * Run one CLI invocation
 *
 * @param argv Arguments after the executable and script
 * @returns Process exit code
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const [name, ...rest] = argv;

  if (!name || name === '--help' || name === '-h') {
    ctx.out(USAGE);
    return name ? 0 : 1;
  }

  const command = COMMANDS[name];
  if (!command) {
    ctx.err(`Unknown command: ${name}`);
    ctx.err(USAGE);
    return 1;
  }

  try {
    return await command(rest, ctx);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.err(`Error: ${message}`);
    return 1;
  }
}

async function fetchNewsCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      company: { type: 'string', short: 'c' },
      limit: { type: 'string', default: '5' },
      'raw-dir': { type: 'string' },
    },
  });
  const company = requireCompany(values.company);

  ctx.out(`Fetching news for ${company} from NewsAPI...`);
  return ingest(ctx, NEWS_PROVIDERS.NEWSAPI, company, values['raw-dir'], {
    limit: parseLimit(values.limit),
  });
}

async function fetchGNewsCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      company: { type: 'string', short: 'c' },
      limit: { type: 'string', default: '10' },
      language: { type: 'string', default: 'en' },
      country: { type: 'string', default: 'us' },
      'raw-dir': { type: 'string' },
    },
  });
  const company = requireCompany(values.company);

  ctx.out(`Fetching news for ${company} from Google News API...`);
  return ingest(ctx, NEWS_PROVIDERS.GNEWS, company, values['raw-dir'], {
    limit: parseLimit(values.limit),
    language: values.language,
    country: values.country,
  });
}

async function ingest(
  ctx: CliContext,
  providerName: string,
  company: string,
  rawDir: string | undefined,
  options: { limit: number; language?: string; country?: string },
): Promise<number> {
  const ingestion = new NewsIngestionService(ctx.registry, new RawNewsStorageService({ directory: rawDir }));
  const { articles, filePath } = await ingestion.fetch(providerName, company, options);

  if (!filePath) {
    ctx.out(`No articles found for ${company}.`);
    return 0;
  }

  ctx.out(`Found ${articles.length} articles.`);
  ctx.out(`Raw response stored at: ${filePath}`);
  articles.forEach((article, index) => {
    ctx.out('');
    ctx.out(`${index + 1}. ${article.title}`);
    ctx.out(`   Source: ${article.source_name ?? 'Unknown'}`);
    ctx.out(`   URL: ${article.url ?? 'No URL'}`);
  });
  return 0;
}

async function processCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      company: { type: 'string', short: 'c' },
      'raw-dir': { type: 'string' },
      'processed-dir': { type: 'string' },
      output: { type: 'string', short: 'o' },
    },
  });
  const company = requireCompany(values.company);

  const processor = new NewsProcessorService(
    new RawNewsStorageService({ directory: values['raw-dir'] }),
    new ProcessedNewsStorageService({ directory: values['processed-dir'] }),
  );
  const { articles, filePath } = await processor.process(company, { outputPath: values.output });

  ctx.out(`Processed ${articles.length} articles for ${company}.`);
  ctx.out(`Processed data saved to ${filePath}`);
  return 0;
}

async function showNewsCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      company: { type: 'string', short: 'c' },
      'raw-dir': { type: 'string' },
      source: { type: 'string', default: 'all' },
    },
  });
  const company = requireCompany(values.company);
  const source = values.source;
  if (source !== 'all' && source !== 'newsapi' && source !== 'gnews') {
    throw new ValidationError(`--source must be one of all, newsapi, gnews (got ${source})`);
  }

  const document = await new RawNewsStorageService({ directory: values['raw-dir'] }).load(company);

  if (source !== 'gnews') {
    printArticles(ctx, 'NewsAPI', normalizeArticles(articlesOf(document.newsapi), 'newsapi'));
  }
  if (source !== 'newsapi') {
    printArticles(ctx, 'Google News', normalizeArticles(articlesOf(document.gnews), 'gnews'));
  }
  return 0;
}

async function listCompaniesCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseArgs({ args, options: { 'raw-dir': { type: 'string' } } });

  const symbols = [...(await new RawNewsStorageService({ directory: values['raw-dir'] }).listSymbols())].sort();
  if (symbols.length === 0) {
    ctx.out('No stored data found for any company.');
    return 0;
  }

  ctx.out(`Found data for ${symbols.length} companies:`);
  for (const symbol of symbols) {
    ctx.out(`- ${symbol}`);
  }
  return 0;
}

async function summarizeCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      company: { type: 'string', short: 'c' },
      'processed-dir': { type: 'string' },
    },
  });
  const company = requireCompany(values.company);

  const document = await new ProcessedNewsStorageService({ directory: values['processed-dir'] }).load(company);
  const summarizer = new NewsSummarizerService(ctx.summaryProvider());
  const summary = await summarizer.summarize(company, document.articles);

  ctx.out(JSON.stringify(summary, null, 2));
  return 0;
}

async function configCommand(args: string[], ctx: CliContext): Promise<number> {
  const { positionals } = parseArgs({ args, allowPositionals: true });
  const [action = 'get', key, value] = positionals;

  if (action === 'get') {
    const config = await loadUserConfig();
    if (!key) {
      for (const [name, setting] of Object.entries(config)) {
        ctx.out(`${name}: ${setting}`);
      }
    } else if (key in config) {
      ctx.out(`${key}: ${config[key]}`);
    } else {
      ctx.out(`Key '${key}' not found in configuration.`);
    }
    return 0;
  }

  if (action === 'set') {
    if (!key || value === undefined) {
      ctx.err('Both key and value are required for set action.');
      return 1;
    }
    await setUserConfigValue(key, value);
    ctx.out(`Set ${key} to ${value}.`);
    return 0;
  }

  throw new ValidationError(`Unknown config action: ${action}`);
}

function printArticles(ctx: CliContext, label: string, articles: Article[]): void {
  if (articles.length === 0) {
    ctx.out(`No ${label} articles found.`);
    return;
  }

  ctx.out('');
  ctx.out(`=== ${label} Articles (${articles.length}) ===`);
  articles.forEach((article, index) => {
    ctx.out('');
    ctx.out(`${index + 1}. ${article.title}`);
    ctx.out(`   Source: ${article.source_name ?? 'Unknown'}`);
    ctx.out(`   Published: ${article.published_at ?? 'Unknown'}`);
    ctx.out(`   URL: ${article.url ?? 'No URL'}`);
    if (article.description) {
      ctx.out(`   Description: ${article.description}`);
    }
  });
}

function articlesOf(response: JsonValue): JsonValue {
  return isJsonObject(response) && response.articles !== undefined ? response.articles : [];
}

function requireCompany(company: string | undefined): string {
  if (!company) {
    throw new ValidationError('--company is required');
  }
  return company;
}

function parseLimit(limit: string | undefined): number {
  const parsed = Number(limit);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`--limit must be a positive integer (got ${limit})`);
  }
  return parsed;
}
