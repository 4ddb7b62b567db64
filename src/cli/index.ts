#!/usr/bin/env node
import { loadEnvironment } from '../config/environment.js';
import { OpenAiSummaryAdapter } from '../adapters/llm/openai-summary.adapter.js';
import { createProviderRegistry } from '../services/news/provider.registry.js';
import { createLogger } from '../utils/logger.js';
import { runCli } from './commands.js';

async function main(): Promise<void> {
  loadEnvironment();
  createLogger();

  process.exitCode = await runCli(process.argv.slice(2), {
    registry: createProviderRegistry(),
    summaryProvider: () => new OpenAiSummaryAdapter(),
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  });
}

main().catch((error) => {
  console.error('newsledger failed:', error);
  process.exit(1);
});
