import { UsageError } from '../core/errors.js';
import { Resolver } from './base.js';
import { MockResolver } from './mock.js';
import type { MockResolverOptions } from './mock.js';
import { PubmedGildaResolver } from './pubmed-gilda.js';
import type { PubmedGildaOptions } from './pubmed-gilda.js';

export * from './base.js';
export * from './pubmed-gilda.js';
export * from './mock.js';

export interface ResolverFactoryOptions extends PubmedGildaOptions {
  mock?: MockResolverOptions;
}

/**
 * Factory for resolvers. Defaults to PubMed + Gilda, with a mock resolver for testing.
 *
 * @param resolverName - Resolver id ('auto'|'pubmed'|'mock'|'test')
 */
export function createResolver(resolverName = 'auto', options: ResolverFactoryOptions = {}): Resolver {
  switch (resolverName.toLowerCase()) {
    case 'mock':
    case 'test':
      return new MockResolver(options.mock);
    case 'pubmed':
    case 'auto':
      return new PubmedGildaResolver({ pubmed: options.pubmed, grounding: options.grounding });
    default:
      throw new UsageError(`Unknown resolver "${resolverName}" (expected auto, pubmed or mock)`);
  }
}
