import type { FetchLike, HttpOptions } from '../http/client.js';
import type { ResolverFactoryOptions } from '../resolvers/index.js';
import type { Sleep } from '../utils/retry.js';
import type { PmidAnnotateConfig } from './types.js';

export interface RuntimeOverrides {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

/**
 * Turn merged configuration plus command-line overrides into resolver options
 */
export function resolveResolverOptions(config: PmidAnnotateConfig, overrides: RuntimeOverrides = {}): ResolverFactoryOptions {
  const http: HttpOptions = {
    timeoutMs: overrides.timeoutMs ?? config.http?.timeoutMs,
    retryDelaysMs: config.http?.retryDelaysMs,
    fetchImpl: overrides.fetchImpl,
    sleep: overrides.sleep
  };

  return {
    pubmed: {
      ...http,
      efetchUrl: config.pubmed?.efetchUrl,
      apiKey: config.pubmed?.apiKey,
      email: config.pubmed?.email,
      tool: config.pubmed?.tool
    },
    grounding: {
      ...http,
      baseUrl: config.grounding?.baseUrl
    }
  };
}
