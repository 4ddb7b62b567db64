import { GNewsApiAdapter } from '../../adapters/news/gnews-api.adapter.js';
import { NewsApiAdapter } from '../../adapters/news/news-api.adapter.js';
import { NotFoundError } from '../../utils/errors.js';
import { NewsProvider } from './news-provider.interface.js';

/**
 * Named set of news providers, built once at start-up and handed to the
 * services that need it
 */
export class ProviderRegistry {
  private providers = new Map<string, NewsProvider>();

  constructor(providers: NewsProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /**
   * Add a provider under its own name, replacing any previous registration
   */
  register(provider: NewsProvider): this {
    this.providers.set(provider.name, provider);
    return this;
  }

  /**
   * @throws NotFoundError if no provider has that name
   */
  get(name: string): NewsProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new NotFoundError('News provider', name);
    }
    return provider;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}

/**
 * Registry with the built-in NewsAPI and GNews adapters
 */
export function createProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry([new NewsApiAdapter(), new GNewsApiAdapter()]);
}
