import { z } from 'zod';

const optionalUrl = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().url().optional(),
);

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // News providers
  NEWS_API_KEY: optionalString,
  NEWS_API_BASE_URL: z.string().url().default('https://newsapi.org'),
  GNEWS_API_KEY: optionalString,
  GNEWS_API_BASE_URL: z.string().url().default('https://gnews.io'),

  // Summarization
  OPENAI_API_KEY: optionalString,
  OPENAI_API_BASE_URL: optionalUrl.transform((value) => value ?? 'https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o'),

  HTTP_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('30000'),

  // Storage (unset means "<cwd>/data/...")
  RAW_DATA_PATH: optionalString,
  PROCESSED_DATA_PATH: optionalString,

  // User config file location override
  NEWSLEDGER_CONFIG_PATH: optionalString,
});

export type Environment = z.infer<typeof envSchema>;

let _env: Environment | null = null;

/**
 * Validate an environment-like record without touching the cached copy.
 */
export function parseEnvironment(source: Record<string, string | undefined>): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  return parsed.data;
}

export function loadEnvironment(): Environment {
  if (_env) {
    return _env;
  }

  _env = parseEnvironment(process.env);
  return _env;
}

export function getEnvironment(): Environment {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnvironment() first.');
  }
  return _env;
}
