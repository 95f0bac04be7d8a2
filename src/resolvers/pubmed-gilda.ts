import { isResolutionError } from '../core/errors.js';
import type { Pmid } from '../core/identifier.js';
import type { InvocationResult, ResolveOptions } from '../core/types.js';
import { annotateText } from '../grounding/gilda.js';
import type { GildaClientOptions } from '../grounding/gilda.js';
import { extractAbstract } from '../pubmed/abstract.js';
import { fetchPubmedXml } from '../pubmed/efetch.js';
import type { PubmedClientOptions } from '../pubmed/efetch.js';
import { log } from '../utils/logger.js';
import { Resolver } from './base.js';

export interface PubmedGildaOptions {
  pubmed?: PubmedClientOptions;
  grounding?: GildaClientOptions;
}

/**
 * Fetches the article from PubMed, extracts its abstract and annotates it
 * with Gilda.
 */
export class PubmedGildaResolver extends Resolver {
  constructor(private readonly options: PubmedGildaOptions = {}) {
    super();
  }

  async resolve(identifier: Pmid, options: ResolveOptions = {}): Promise<InvocationResult> {
    try {
      const xml = await fetchPubmedXml(identifier, this.options.pubmed);
      const abstract = extractAbstract(xml, identifier.value);
      log.debug('Extracted abstract', { pmid: identifier.value, characters: abstract.length });

      if (options.abstractOnly) {
        return { success: true, identifier, abstract, annotations: null };
      }

      const annotations = await annotateText(abstract, this.options.grounding);
      log.debug('Annotated abstract', { pmid: identifier.value, annotations: annotations.length });

      return { success: true, identifier, abstract, annotations };
    } catch (error) {
      if (isResolutionError(error)) {
        return { success: false, identifier, error };
      }
      throw error;
    }
  }

  getName(): string {
    return 'pubmed';
  }
}
