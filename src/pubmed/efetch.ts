import { PUBMED_CONSTANTS } from '../config/constants.js';
import type { Pmid } from '../core/identifier.js';
import { requestText } from '../http/client.js';
import type { HttpOptions } from '../http/client.js';

export interface PubmedClientOptions extends HttpOptions {
  efetchUrl?: string;
  /** NCBI API key; raises the E-utilities rate limit */
  apiKey?: string;
  email?: string;
  tool?: string;
}

const SERVICE_NAME = 'PubMed eFetch';

export function buildEfetchUrl(pmid: Pmid, options: PubmedClientOptions = {}): URL {
  const url = new URL(options.efetchUrl ?? PUBMED_CONSTANTS.EFETCH_URL);
  url.searchParams.set('db', PUBMED_CONSTANTS.DATABASE);
  url.searchParams.set('id', pmid.value);
  url.searchParams.set('retmode', PUBMED_CONSTANTS.RETMODE);

  if (options.apiKey) url.searchParams.set('api_key', options.apiKey);
  if (options.email) url.searchParams.set('email', options.email);
  if (options.tool) url.searchParams.set('tool', options.tool);

  return url;
}

/**
 * Fetch a PubMed article's XML metadata via eFetch.
 */
export async function fetchPubmedXml(pmid: Pmid, options: PubmedClientOptions = {}): Promise<string> {
  return requestText(buildEfetchUrl(pmid, options), { method: 'GET' }, { ...options, service: SERVICE_NAME });
}
